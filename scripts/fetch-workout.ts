import { createWorkoutLogClient } from '../src/lib/workoutLogs/client'
import { getErrorMessage } from '../src/utils/errorMessage'

const [username, date] = process.argv.slice(2)

if (!username || !date) {
  process.stderr.write('usage: fetch-workout <username> <yyyy-mm-dd>\n')
  process.exitCode = 2
} else {
  const client = createWorkoutLogClient()
  try {
    const exercises = await client.getWorkout(username, date)
    process.stdout.write(`${JSON.stringify(exercises, null, 2)}\n`)
  } catch (e: unknown) {
    process.stderr.write(`${getErrorMessage(e)}\n`)
    process.exitCode = 1
  }
}
