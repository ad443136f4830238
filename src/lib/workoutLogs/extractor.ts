import * as cheerio from 'cheerio'
import { logWarn } from '@/lib/logger'
import type { ExerciseRecord, MissingLogListMode } from '@/schemas/workoutLog'
import { parseLogNumber } from '@/utils/logNumber'
import { LogLayoutError } from './errors'
import { parseSets } from './parser'

const LOG_LIST = '#logList1'
const EXERCISE_BLOCK = 'div.exercise-block'
const LOG_BAR = 'div.fixedLogBar'
const LOG_BAR_BLOCK = 'div.fixedLogBarBlock.align-top'
const LOG_BAR_FIELDS = ['picture', 'name', 'oneRepMax', 'logs'] as const

export type ExtractOptions = {
  missingLogList?: MissingLogListMode
}

type LogBarFields<T> = Record<(typeof LOG_BAR_FIELDS)[number], T>

/** Names the log bar blocks by position, refusing any count but four. */
export function unpackLogBar<T>(blocks: readonly T[], exerciseIndex: number): LogBarFields<T> {
  const [picture, name, oneRepMax, logs] = blocks
  if (
    blocks.length !== LOG_BAR_FIELDS.length ||
    picture === undefined ||
    name === undefined ||
    oneRepMax === undefined ||
    logs === undefined
  ) {
    throw new LogLayoutError('log_bar_block_count', {
      exerciseIndex,
      expected: LOG_BAR_FIELDS.length,
      actual: blocks.length,
    })
  }
  return { picture, name, oneRepMax, logs }
}

/**
 * Reads every exercise block of a logs page, in page order.
 *
 * Throws LogLayoutError as soon as one block does not have the expected
 * shape; nothing is returned for the blocks before it either.
 */
export function extractExercises(html: string, options: ExtractOptions = {}): ExerciseRecord[] {
  const $ = cheerio.load(html)
  const logList = $(LOG_LIST).first()

  if (!logList.length) {
    if (options.missingLogList === 'error') throw new LogLayoutError('log_list_missing')
    logWarn('workout-logs', 'log list not found on page, treating as no workout')
    return []
  }

  return logList
    .find(EXERCISE_BLOCK)
    .toArray()
    .map((element, exerciseIndex) => {
      const blocks = $(element).find(LOG_BAR).first().find(LOG_BAR_BLOCK).toArray()
      const fields = unpackLogBar(blocks, exerciseIndex)

      const exerciseName = $(fields.name).find('a').first().text().trim()
      if (!exerciseName) throw new LogLayoutError('exercise_name_missing', { exerciseIndex })

      const oneRepMaxText = $(fields.oneRepMax).text()
      const oneRepMax = parseLogNumber(oneRepMaxText)
      if (oneRepMax === null) {
        throw new LogLayoutError('one_rep_max_invalid', { exerciseIndex, text: oneRepMaxText.trim() })
      }

      return Object.freeze({
        exercise_name: exerciseName,
        one_rep_max: oneRepMax,
        lifting_logs: Object.freeze(parseSets($(fields.logs).text())),
      })
    })
}
