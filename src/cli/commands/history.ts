import chalk from 'chalk'
import type {Command} from 'commander'
import type {BuildRecord} from '../../engine/build-store.js'
import {formatDuration, shortId} from '../../core/utils.js'
import {openStore} from '../utils.js'

function colorStatus(status: BuildRecord['status']): string {
  switch (status) {
    case 'succeeded': {
      return chalk.green(status)
    }

    case 'failed': {
      return chalk.red(status)
    }

    default: {
      return chalk.yellow(status)
    }
  }
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .alias('ls')
    .description('List recorded builds')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {store, json} = await openStore(cmd)
      const records: BuildRecord[] = []
      for (const buildId of await store.listBuilds()) {
        records.push(await store.readRecord(buildId))
      }

      if (json) {
        console.log(JSON.stringify(records.map(r => ({
          buildId: r.buildId,
          plan: r.planId,
          status: r.status,
          imageId: r.imageId,
          tag: r.tag,
          durationMs: r.durationMs,
          finishedAt: r.finishedAt
        })), null, 2))
        return
      }

      if (records.length === 0) {
        console.log(chalk.gray('No builds found.'))
        return
      }

      const rows = records.map(r => ({
        buildId: r.buildId,
        plan: r.planName ?? r.planId,
        status: r.status,
        duration: r.durationMs === undefined ? '-' : formatDuration(r.durationMs),
        image: r.imageId ? shortId(r.imageId) : '-'
      }))

      const idWidth = Math.max('BUILD'.length, ...rows.map(r => r.buildId.length))
      const planWidth = Math.max('PLAN'.length, ...rows.map(r => r.plan.length))
      const statusWidth = Math.max('STATUS'.length, ...rows.map(r => r.status.length))
      const durationWidth = Math.max('DURATION'.length, ...rows.map(r => r.duration.length))

      console.log(chalk.bold(
        `${'BUILD'.padEnd(idWidth)}  ${'PLAN'.padEnd(planWidth)}  ${'STATUS'.padEnd(statusWidth)}  ${'DURATION'.padStart(durationWidth)}  IMAGE`
      ))
      for (const row of rows) {
        const status = colorStatus(row.status)
        console.log(
          `${row.buildId.padEnd(idWidth)}  ${row.plan.padEnd(planWidth)}  ${status.padEnd(statusWidth + (status.length - row.status.length))}  ${row.duration.padStart(durationWidth)}  ${row.image}`
        )
      }
    })
}
