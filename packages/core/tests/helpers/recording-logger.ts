import type { Logger } from '../../src/common/index.js'

export interface RecordingLogger extends Logger {
  logs: string[]
  warnings: string[]
  errors: string[]
}

export function recordingLogger(): RecordingLogger {
  const logs: string[] = []
  const warnings: string[] = []
  const errors: string[] = []
  return {
    logs,
    warnings,
    errors,
    log: (...args: unknown[]) => { logs.push(args.map(String).join(' ')) },
    warn: (...args: unknown[]) => { warnings.push(args.map(String).join(' ')) },
    error: (...args: unknown[]) => { errors.push(args.map(String).join(' ')) },
  }
}
