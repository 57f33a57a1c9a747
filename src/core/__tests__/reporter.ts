import test from 'ava'
import pino from 'pino'
import {ConsoleReporter} from '../reporter.js'

function capture(): {reporter: ConsoleReporter; entries: Array<Record<string, unknown>>} {
  const entries: Array<Record<string, unknown>> = []
  const logger = pino({level: 'debug'}, {
    write(message: string) {
      entries.push(JSON.parse(message) as Record<string, unknown>)
    }
  })
  return {reporter: new ConsoleReporter(logger), entries}
}

const step = {index: 1, id: 'install', displayName: 'Install packages'}

test('emit logs events at info level', t => {
  const {reporter, entries} = capture()
  reporter.emit({event: 'STEP_STARTING', buildId: 'b1', step})

  t.is(entries.length, 1)
  t.is(entries[0].level, 30)
  t.is(entries[0].event, 'STEP_STARTING')
  t.is(entries[0].buildId, 'b1')
})

test('emit logs failures at error level', t => {
  const {reporter, entries} = capture()
  reporter.emit({event: 'STEP_FAILED', buildId: 'b1', step, exitCode: 1, timedOut: false})
  reporter.emit({event: 'BUILD_FAILED', buildId: 'b1', step, message: 'Step 1 (install) failed with exit code 1'})

  t.deepEqual(entries.map(e => e.level), [50, 50])
  t.is(entries[1].message, 'Step 1 (install) failed with exit code 1')
})

test('log includes the step id and stream', t => {
  const {reporter, entries} = capture()
  reporter.log('b1', step, 'stderr', 'warning: low disk')

  t.is(entries[0].stepId, 'install')
  t.is(entries[0].stream, 'stderr')
  t.is(entries[0].line, 'warning: low disk')
})

test('result logs at debug level', t => {
  const {reporter, entries} = capture()
  const now = new Date()
  reporter.result('b1', step, {exitCode: 0, startedAt: now, finishedAt: now, layerId: 'sha256:layer1'})
  t.is(entries[0].level, 20)
})
