import chalk from 'chalk'
import {
  formatBytes,
  formatEvalDuration,
  formatFailure,
  formatTimestamp,
  type GenerationFailure,
  type Notice,
  type PullProgressEvent,
} from '@hearth/gateway'

const NOTICE_STYLES: Record<Notice['level'], (text: string) => string> = {
  info: chalk.cyan,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
}

export function printNotice(notice: Notice) {
  console.log(chalk.dim(`[${formatTimestamp(notice.at)}] `) + NOTICE_STYLES[notice.level](notice.text))
}

export function printFailure(failure: GenerationFailure) {
  console.error(chalk.red(formatFailure(failure)))
}

export function printError(message: string) {
  console.error(chalk.red(`Error: ${message}`))
}

export function printEvalDuration(nanoseconds: number | undefined) {
  if (nanoseconds !== undefined) {
    console.error(chalk.dim(`(${formatEvalDuration(nanoseconds)})`))
  }
}

/** `downloading sha256:4f2a 50% of 4.4 GB` */
export function describePullEvent(event: PullProgressEvent): string {
  const parts = [event.status]
  if (event.digest && !event.status.includes(event.digest)) {
    parts.push(event.digest.slice(0, 19))
  }
  if (event.total !== undefined && event.total > 0 && event.completed !== undefined) {
    const percent = Math.floor((event.completed / event.total) * 100)
    parts.push(`${percent}% of ${formatBytes(event.total)}`)
  }
  return parts.join(' ')
}
