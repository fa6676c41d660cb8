/**
 * Process module for reelsort
 * External command execution, dependency checks, signal handling and a bounded worker pool
 * Shared across all modules
 */

import { spawn } from 'node:child_process';
import { STDERR_TAIL_CHARS } from './constants.js';
import { getLogger } from './logger.js';

const logger = getLogger().child('process');

//═══════════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
//═══════════════════════════════════════════════════════════════════════════════

/** Buffered result of a finished command */
export interface CommandOutput {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Run a command to completion and collect its output
 * Rejects only when the process cannot be started (e.g. binary not found)
 */
export function runCommand(cmd: string, args: string[]): Promise<CommandOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.once('error', reject);
    child.once('close', (code) => {
      resolve({ code: code ?? -1, stdout, stderr });
    });
  });
}

export interface StreamingOptions {
  /** Called with every decoded stderr chunk as it arrives */
  onStderr?: (chunk: string) => void;
  /** Run in a separate process group so a terminal SIGINT does not reach the child */
  detached?: boolean;
}

/** Result of a streamed command; only the tail of stderr is retained */
export interface StreamingResult {
  code: number;
  stderrTail: string;
}

/**
 * Spawn a long-running command, draining stderr incrementally
 * stdout is discarded; stderr is forwarded chunk by chunk and its tail kept for diagnostics
 */
export function spawnStreaming(
  cmd: string,
  args: string[],
  options: StreamingOptions = {},
): Promise<StreamingResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      stdio: ['ignore', 'ignore', 'pipe'],
      detached: options.detached ?? false,
    });
    let tail = '';

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      tail = (tail + chunk).slice(-STDERR_TAIL_CHARS);
      options.onStderr?.(chunk);
    });

    child.once('error', reject);
    child.once('close', (code) => {
      resolve({ code: code ?? -1, stderrTail: tail });
    });
  });
}

/**
 * Check if a command is available in PATH
 */
export async function checkCommand(cmd: string): Promise<boolean> {
  try {
    const { code } = await runCommand(cmd, ['-version']);
    return code === 0;
  } catch {
    return false;
  }
}

/**
 * Check if ffmpeg and ffprobe are available
 */
export async function checkFFmpegDependencies(
  ffmpegPath = 'ffmpeg',
  ffprobePath = 'ffprobe',
): Promise<{ ffmpeg: boolean; ffprobe: boolean }> {
  return {
    ffmpeg: await checkCommand(ffmpegPath),
    ffprobe: await checkCommand(ffprobePath),
  };
}

//═══════════════════════════════════════════════════════════════════════════════
// SIGNAL HANDLING
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Setup signal handlers for graceful shutdown
 * The first SIGINT/SIGTERM calls onShutdown; later ones are ignored with a warning.
 * Returns a function that removes the handlers.
 */
export function setupSignalHandlers(onShutdown: (signal: NodeJS.Signals) => void): () => void {
  let received = false;

  const handleSignal = (signal: NodeJS.Signals) => {
    if (received) {
      logger.warn(`Received ${signal} again, still waiting for running encodes to finish`);
      return;
    }
    received = true;
    logger.info(`Received ${signal}, finishing in-flight work and shutting down...`);
    onShutdown(signal);
  };

  process.on('SIGINT', handleSignal);
  process.on('SIGTERM', handleSignal);

  return () => {
    process.off('SIGINT', handleSignal);
    process.off('SIGTERM', handleSignal);
  };
}

//═══════════════════════════════════════════════════════════════════════════════
// CHANNEL AND WORKER POOL
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Unbounded multi-producer, single-consumer channel
 * Consumed with for await; iteration ends once the channel is closed and drained
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  send(value: T): void {
    if (this.closed) {
      throw new Error('Cannot send on a closed channel');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.buffer.push(value);
    }
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) {
        return Promise.resolve({ value, done: false });
      }
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}

export interface WorkerPoolOptions<T, R> {
  /** Number of concurrent workers */
  size: number;
  /** Unit of work; its result is sent to the results channel */
  worker: (item: T) => Promise<R>;
  /** Converts an unexpected worker rejection into a result so the pool keeps going */
  onError: (item: T, error: unknown) => R;
  /** Checked before each new item is taken; true stops submission */
  isCancelled?: () => boolean;
}

/**
 * Fixed-size worker pool
 * Workers pull items from a shared iterator and push results, in completion order,
 * to a channel that a single consumer drains.
 */
export class WorkerPool<T, R> {
  private readonly options: WorkerPoolOptions<T, R>;

  constructor(options: WorkerPoolOptions<T, R>) {
    if (options.size < 1) {
      throw new Error(`Worker pool size must be at least 1 (got ${options.size})`);
    }
    this.options = options;
  }

  /** Start processing and return the results channel */
  run(items: Iterable<T>): Channel<R> {
    const results = new Channel<R>();
    const iterator = items[Symbol.iterator]();
    const { size, worker, onError, isCancelled } = this.options;

    const takeNext = (): IteratorYieldResult<T> | null => {
      if (isCancelled?.()) return null;
      const next = iterator.next();
      return next.done ? null : next;
    };

    const loop = async (): Promise<void> => {
      for (let next = takeNext(); next; next = takeNext()) {
        let result: R;
        try {
          result = await worker(next.value);
        } catch (error) {
          result = onError(next.value, error);
        }
        results.send(result);
      }
    };

    const loops = Array.from({ length: size }, () => loop());
    void Promise.all(loops).then(
      () => results.close(),
      (error: unknown) => {
        logger.error('Worker pool stopped unexpectedly:', error);
        results.close();
      },
    );

    return results;
  }
}
