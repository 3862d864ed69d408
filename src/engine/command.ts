/**
 * Command engine
 *
 * Delegates model construction to an external executable. Parameters and mesh
 * settings accumulate in the session; save() writes them as a JSON job file
 * next to the requested output and runs
 *
 *   <command> ...args <output>.job.json
 *
 * under a hard timeout. The child is killed when the combination's signal
 * aborts. The executable is expected to load the template, apply the job and
 * write the model to `output`. The job file is removed afterwards whatever
 * the outcome.
 */

import { execFile } from 'child_process';
import { constants } from 'fs';
import { access, rm, writeFile } from 'fs/promises';
import { promisify } from 'util';
import { TimeoutError } from '../framework/errors.js';
import type { MeshParams } from '../stages/mesh.js';
import type { ModelEngine, ModelSession } from './types.js';

// =============================================================================
// JOB RUNNER
// =============================================================================

export interface JobOutput {
  stdout: string;
  stderr: string;
}

export type JobRunner = (
  command: string,
  args: readonly string[],
  timeoutMs: number,
  signal?: AbortSignal
) => Promise<JobOutput>;

export interface ModelJob {
  template: string;
  output: string;
  parameters: Record<string, string>;
  mesh: MeshParams | null;
}

const execFileAsync = promisify(execFile);

function wasKilled(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'killed' in err && err.killed === true;
}

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string') {
    return err.stderr.trim();
  }
  return '';
}

/**
 * Run one external job. A kill on timeout becomes TimeoutError; an abort
 * kills the child and rejects with the signal's reason.
 */
export const runExternalJob: JobRunner = async (command, args, timeoutMs, signal) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      timeout: timeoutMs,
      maxBuffer: 16 * 1024 * 1024,
      signal,
    });
    return { stdout, stderr };
  } catch (err) {
    if (signal?.aborted) {
      throw signal.reason instanceof Error
        ? signal.reason
        : new TimeoutError(`${command} was stopped before finishing`, timeoutMs, { command });
    }
    if (wasKilled(err)) {
      throw new TimeoutError(`${command} timed out after ${timeoutMs} ms`, timeoutMs, { command });
    }
    const detail = stderrOf(err) || (err instanceof Error ? err.message : String(err));
    throw new Error(`${command} failed: ${detail}`);
  }
};

// =============================================================================
// SESSION
// =============================================================================

export interface CommandEngineOptions {
  command: string;
  args: readonly string[];
  timeoutMs: number;
  knownParameters: readonly string[];
  runner?: JobRunner;
}

class CommandSession implements ModelSession {
  private readonly values = new Map<string, string>();
  private mesh: MeshParams | null = null;

  constructor(
    private readonly templatePath: string,
    private readonly options: CommandEngineOptions,
    private readonly runner: JobRunner
  ) {
    for (const name of options.knownParameters) {
      this.values.set(name, '');
    }
  }

  async parameterNames(): Promise<string[]> {
    return Array.from(this.values.keys());
  }

  async getParameter(name: string): Promise<string> {
    const value = this.values.get(name);
    if (value === undefined) {
      throw new Error(`Unknown parameter: ${name}`);
    }
    return value;
  }

  async setParameter(name: string, expression: string): Promise<void> {
    if (!this.values.has(name)) {
      throw new Error(`Unknown parameter: ${name}`);
    }
    this.values.set(name, expression);
  }

  async runMesh(mesh: MeshParams): Promise<void> {
    this.mesh = mesh;
  }

  async save(path: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const jobPath = `${path}.job.json`;
    const job: ModelJob = {
      template: this.templatePath,
      output: path,
      parameters: Object.fromEntries(this.values),
      mesh: this.mesh,
    };
    await writeFile(jobPath, JSON.stringify(job, null, 2), 'utf-8');
    try {
      await this.runner(this.options.command, [...this.options.args, jobPath], this.options.timeoutMs, signal);
    } finally {
      await rm(jobPath, { force: true });
    }
  }

  async close(): Promise<void> {
    this.values.clear();
    this.mesh = null;
  }
}

// =============================================================================
// ENGINE
// =============================================================================

export class CommandEngine implements ModelEngine {
  readonly name = 'command';
  private readonly runner: JobRunner;

  constructor(private readonly options: CommandEngineOptions) {
    this.runner = options.runner ?? runExternalJob;
  }

  async connect(): Promise<void> {
    // Bare names are resolved through PATH by the OS at spawn time
    if (this.options.command.includes('/') || this.options.command.includes('\\')) {
      await access(this.options.command, constants.X_OK);
    }
  }

  async load(templatePath: string): Promise<ModelSession> {
    try {
      await access(templatePath, constants.R_OK);
    } catch (err) {
      throw new Error(`Template file not found: ${templatePath}`, { cause: err });
    }
    return new CommandSession(templatePath, this.options, this.runner);
  }

  async disconnect(): Promise<void> {}
}
