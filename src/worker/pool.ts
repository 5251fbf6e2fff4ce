import os from 'node:os'
import { Worker } from 'node:worker_threads'
import { PoolFailureError } from '../solver/errors'
import {
  evaluateUnit,
  packCandidates,
  type EntropyUnit,
  type EntropyUnitResult,
  type Msg,
  type OutMsg,
} from './protocol'

export interface EvaluationPool {
  /** Number of units that can run at the same time. */
  readonly size: number
  /** Aborting `signal` drops the unit if it has not started; running units finish. */
  evaluate(unit: EntropyUnit, signal?: AbortSignal): Promise<EntropyUnitResult>
  close(): Promise<void>
}

function discarded(): PoolFailureError {
  return new PoolFailureError('Evaluation discarded before it started')
}

export const MAX_DEFAULT_WORKERS = 8

export function defaultWorkerCount(): number {
  return Math.max(1, Math.min(MAX_DEFAULT_WORKERS, os.availableParallelism()))
}

/** Runs units on the calling thread, one per event-loop turn. */
export class InlinePool implements EvaluationPool {
  readonly size = 1
  private closed = false

  evaluate(unit: EntropyUnit, signal?: AbortSignal): Promise<EntropyUnitResult> {
    if (this.closed) return Promise.reject(new PoolFailureError('Pool is closed'))
    return new Promise<EntropyUnitResult>((resolve, reject) => {
      setImmediate(() => {
        if (signal?.aborted) {
          reject(discarded())
          return
        }
        try {
          resolve(evaluateUnit(unit))
        } catch (err) {
          reject(err)
        }
      })
    })
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

interface PendingJob {
  msg: Msg
  resolve: (value: EntropyUnitResult) => void
  reject: (error: unknown) => void
}

interface PoolWorker {
  worker: Worker
  current: PendingJob | null
}

export interface WorkerThreadPoolOptions {
  size?: number
  /** Worker entry module; defaults to the bundled entropy worker. */
  workerUrl?: URL
}

const DEFAULT_WORKER_URL = new URL('./entropy.worker.ts', import.meta.url)

// Node 20 will not load a .ts entry even with `--import tsx` in execArgv, so
// TypeScript entries start from a script that registers tsx in the thread first.
function tsxBootstrap(url: URL): string {
  return `import('tsx/esm/api').then(({ register }) => { register(); return import(${JSON.stringify(url.href)}) })`
}

function createWorker(url: URL): Worker {
  if (url.pathname.endsWith('.ts')) return new Worker(tsxBootstrap(url), { eval: true })
  return new Worker(url)
}

/**
 * Fixed-size pool of worker threads. Workers are spawned on first use and run
 * one unit at a time; extra units wait in a FIFO queue. Any worker error fails
 * the whole pool.
 */
export class WorkerThreadPool implements EvaluationPool {
  readonly size: number
  private readonly workerUrl: URL
  private workers: PoolWorker[] = []
  private queue: PendingJob[] = []
  private msgId = 1
  private failure: PoolFailureError | null = null
  private closing = false

  constructor(opts: WorkerThreadPoolOptions = {}) {
    this.size = Math.max(1, Math.floor(opts.size ?? defaultWorkerCount()))
    this.workerUrl = opts.workerUrl ?? DEFAULT_WORKER_URL
  }

  evaluate(unit: EntropyUnit, signal?: AbortSignal): Promise<EntropyUnitResult> {
    if (this.failure) return Promise.reject(this.failure)
    if (this.closing) return Promise.reject(new PoolFailureError('Pool is closed'))
    if (signal?.aborted) return Promise.reject(discarded())
    const msg: Msg = {
      id: this.msgId++,
      type: 'evaluate',
      payload: {
        offset: unit.offset,
        words: unit.words.slice(),
        candidates: packCandidates(unit.candidates),
      },
    }
    return new Promise<EntropyUnitResult>((resolve, reject) => {
      const job: PendingJob = { msg, resolve, reject }
      this.queue.push(job)
      signal?.addEventListener('abort', () => this.discard(job), { once: true })
      this.drain()
    })
  }

  // Only queued jobs are dropped; a job already posted to a worker runs to completion.
  private discard(job: PendingJob): void {
    const i = this.queue.indexOf(job)
    if (i < 0) return
    this.queue.splice(i, 1)
    job.reject(discarded())
  }

  private drain(): void {
    if (this.workers.length === 0) this.spawnAll()
    for (const pw of this.workers) {
      if (this.failure) return
      if (pw.current) continue
      const job = this.queue.shift()
      if (!job) return
      pw.current = job
      pw.worker.postMessage(job.msg)
    }
  }

  private spawnAll(): void {
    for (let i = 0; i < this.size && !this.failure; i++) {
      try {
        this.workers.push(this.spawn())
      } catch (err) {
        this.fail(err)
      }
    }
  }

  private spawn(): PoolWorker {
    const worker = createWorker(this.workerUrl)
    const pw: PoolWorker = { worker, current: null }
    worker.on('message', (msg: OutMsg) => this.handleMessage(pw, msg))
    worker.on('error', (err) => this.fail(err))
    worker.on('exit', (code) => {
      if (!this.closing && code !== 0) this.fail(new Error(`Worker exited with code ${code}`))
    })
    return pw
  }

  private handleMessage(pw: PoolWorker, msg: OutMsg): void {
    const job = pw.current
    if (!job || job.msg.id !== msg.id) return // stale
    pw.current = null
    switch (msg.type) {
      case 'result':
        job.resolve(msg.result)
        break
      case 'error': {
        const err = new Error(msg.error.message)
        if (msg.error.stack) err.stack = msg.error.stack
        job.reject(err)
        break
      }
    }
    this.drain()
  }

  private fail(cause: unknown): void {
    if (this.failure) return
    const message = cause instanceof Error ? cause.message : String(cause)
    this.failure = new PoolFailureError(`Evaluation pool failed: ${message}`, { cause })
    const jobs = [...this.queue]
    for (const pw of this.workers) {
      if (pw.current) jobs.push(pw.current)
      pw.current = null
    }
    this.queue = []
    for (const job of jobs) job.reject(this.failure)
  }

  async close(): Promise<void> {
    this.closing = true
    const closed = new PoolFailureError('Pool is closed')
    for (const job of this.queue) job.reject(closed)
    this.queue = []
    for (const pw of this.workers) {
      pw.current?.reject(closed)
      pw.current = null
    }
    await Promise.all(this.workers.map((pw) => pw.worker.terminate()))
    this.workers = []
  }
}

/** 0 workers selects the inline pool; undefined uses the hardware default. */
export function createEvaluationPool(workers?: number): EvaluationPool {
  if (workers === 0) return new InlinePool()
  return new WorkerThreadPool({ size: workers })
}
