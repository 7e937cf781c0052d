/**
 * Tool Runner - Spawns ffmpeg, ffprobe and other media tools with job tracking
 *
 * Provides:
 * - Job registration and tracking
 * - Timeout enforcement
 * - Cancellation support
 * - Guaranteed cleanup
 *
 * Results always resolve; callers inspect `success` instead of catching.
 */

import { spawn, type ChildProcess } from 'child_process'

export interface ToolJob {
  id: string
  command: string
  process: ChildProcess
  startTime: number
  timeoutHandle: NodeJS.Timeout | null
  cancel: () => void
}

export enum ToolErrorType {
  SPAWN_FAILED = 'spawn_failed',
  TIMEOUT = 'timeout',
  CANCELLED = 'cancelled',
  NON_ZERO_EXIT = 'non_zero_exit',
  INVALID_OUTPUT = 'invalid_output'
}

export interface ToolError {
  type: ToolErrorType
  message: string
  stderr?: string
  exitCode?: number
}

export interface ToolResult {
  success: boolean
  exitCode: number | null
  stdout: string
  stderr: string
  error?: ToolError
}

export interface RunToolOptions {
  command: string
  args: string[]
  timeoutMs?: number
  jobId?: string
}

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000

// Keep error payloads readable; ffmpeg banners can run to kilobytes
const STDERR_TAIL_CHARS = 2000

/**
 * Global job registry
 */
const activeJobs = new Map<string, ToolJob>()

function generateJobId(command: string): string {
  return `${command}-${Date.now()}-${Math.random().toString(36).substring(7)}`
}

export function stderrTail(stderr: string): string {
  return stderr.length > STDERR_TAIL_CHARS ? stderr.slice(-STDERR_TAIL_CHARS) : stderr
}

/**
 * Clean up a job: kill process, clear timeout, remove from registry
 */
function cleanupJob(jobId: string): void {
  const job = activeJobs.get(jobId)
  if (!job) return

  if (job.timeoutHandle) {
    clearTimeout(job.timeoutHandle)
  }

  if (job.process.exitCode === null && !job.process.killed) {
    try {
      job.process.kill('SIGTERM')
    } catch (err) {
      console.error(`[encoder] Failed to kill ${job.command} job ${jobId}:`, err)
    }
  }

  activeJobs.delete(jobId)
}

/**
 * Cancel a running job by ID
 */
export function cancelJob(jobId: string): boolean {
  const job = activeJobs.get(jobId)
  if (!job) return false

  job.cancel()
  return true
}

/**
 * Cancel all active jobs (e.g. on SIGINT)
 */
export function cancelAllJobs(): void {
  const jobIds = Array.from(activeJobs.keys())
  for (const jobId of jobIds) {
    cancelJob(jobId)
  }
}

/**
 * Get number of active jobs
 */
export function getActiveJobCount(): number {
  return activeJobs.size
}

/**
 * Run a tool with job tracking and timeout
 */
export function runTool(options: RunToolOptions): Promise<ToolResult> {
  const { command, args, timeoutMs = DEFAULT_TIMEOUT_MS, jobId: providedJobId } = options

  return new Promise((resolve) => {
    const jobId = providedJobId || generateJobId(command)
    let stdout = ''
    let stderr = ''
    let settled = false

    const settle = (result: ToolResult): void => {
      if (settled) return
      settled = true
      cleanupJob(jobId)
      resolve(result)
    }

    const fail = (type: ToolErrorType, message: string, exitCode: number | null = null): void => {
      settle({
        success: false,
        exitCode,
        stdout,
        stderr,
        error: {
          type,
          message,
          stderr: stderrTail(stderr),
          ...(exitCode !== null ? { exitCode } : {})
        }
      })
    }

    let proc: ChildProcess
    try {
      proc = spawn(command, args)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      fail(ToolErrorType.SPAWN_FAILED, `Failed to spawn ${command}: ${reason}`)
      return
    }

    const timeoutHandle = setTimeout(() => {
      fail(ToolErrorType.TIMEOUT, `${command} timed out after ${timeoutMs / 1000}s`)
    }, timeoutMs)

    activeJobs.set(jobId, {
      id: jobId,
      command,
      process: proc,
      startTime: Date.now(),
      timeoutHandle,
      cancel: () => fail(ToolErrorType.CANCELLED, `${command} job ${jobId} was cancelled`)
    })

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    proc.on('close', (code: number | null) => {
      if (code === 0) {
        settle({ success: true, exitCode: 0, stdout, stderr })
      } else {
        fail(ToolErrorType.NON_ZERO_EXIT, `${command} exited with code ${code}`, code)
      }
    })

    proc.on('error', (err: Error) => {
      fail(ToolErrorType.SPAWN_FAILED, `Failed to spawn ${command}: ${err.message}`)
    })
  })
}
