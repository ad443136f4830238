import { SetRecordSchema, type SetRecord } from '@/schemas/workoutLog'

// "Set 1 : 70x5". Integer weights only; "Set 1 : 70.5x5" does not match.
const SET_TOKEN = /Set (\d+) : (\d+)x(\d+)/g

/**
 * Turns the raw log text of one exercise ("Set 1 : 70x5 Set 2 : 70x5") into
 * set records, in the order they appear. Text that does not match the token
 * shape is ignored.
 */
export function parseSets(text: string): SetRecord[] {
  const sets: SetRecord[] = []
  for (const match of text.matchAll(SET_TOKEN)) {
    const parsed = SetRecordSchema.safeParse({
      set_number: Number(match[1]),
      weight: Number(match[2]),
      reps: Number(match[3]),
    })
    // "Set 0" and digits past the safe integer range are rejected here
    if (!parsed.success) continue
    sets.push(Object.freeze(parsed.data))
  }
  return sets
}
