/**
 * Shared Test Utilities
 *
 * In-process stand-ins used by the orchestrator and CLI tests: a scriptable
 * fake engine, temporary output directories, a config builder and log capture.
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { deepMerge, parseConfig } from './config.js';
import type { BatchConfig } from './config.js';
import type { ModelEngine, ModelSession } from './engine/types.js';
import { Logger } from './framework/logger.js';
import type { LogEntry } from './framework/logger.js';
import type { MeshParams } from './stages/mesh.js';

// =============================================================================
// FAKE ENGINE
// =============================================================================

export type FakeOperation = 'load' | 'setParameter' | 'runMesh' | 'save' | 'close';

export interface FakeEngineOptions {
  knownParameters: readonly string[];

  /** Load numbers (1-based, one per combination attempt) at which an operation throws */
  failOn?: Partial<Record<FakeOperation, readonly number[]>>;

  /** Operation that never settles on the given load until its signal aborts */
  hangOn?: { operation: FakeOperation; load: number };

  /** save() that takes `ms` on the given load and ignores its signal */
  slowSaveOn?: { load: number; ms: number };

  /** Load numbers whose save() reports success without writing a file */
  skipWriteOn?: readonly number[];

  connectError?: Error;
}

class FakeSession implements ModelSession {
  private readonly values = new Map<string, string>();

  constructor(private readonly engine: FakeEngine, readonly load: number) {
    for (const name of engine.options.knownParameters) {
      this.values.set(name, '');
    }
  }

  async parameterNames(): Promise<string[]> {
    return Array.from(this.values.keys());
  }

  async getParameter(name: string): Promise<string> {
    return this.values.get(name) ?? '';
  }

  async setParameter(name: string, expression: string): Promise<void> {
    await this.engine.step('setParameter', this.load);
    this.values.set(name, expression);
    this.engine.assignments.push({ load: this.load, name, expression });
  }

  async runMesh(mesh: MeshParams, signal?: AbortSignal): Promise<void> {
    await this.engine.step('runMesh', this.load, signal);
    this.engine.meshes.push(mesh);
  }

  async meshStatistics(): Promise<Record<string, number>> {
    return { elements: 42 };
  }

  async save(path: string, signal?: AbortSignal): Promise<void> {
    const { engine } = this;
    engine.activeSaves++;
    engine.maxActiveSaves = Math.max(engine.maxActiveSaves, engine.activeSaves);
    try {
      await engine.step('save', this.load, signal);
      const slow = engine.options.slowSaveOn;
      if (slow && slow.load === this.load) {
        await new Promise(resolve => setTimeout(resolve, slow.ms));
      }
      if (!engine.options.skipWriteOn?.includes(this.load)) {
        await writeFile(path, `fake model ${this.load}\n`, 'utf-8');
      }
      engine.saved.push(path);
    } finally {
      engine.activeSaves--;
    }
  }

  async close(): Promise<void> {
    this.engine.closes++;
    await this.engine.step('close', this.load);
  }
}

export class FakeEngine implements ModelEngine {
  readonly name = 'fake';

  connects = 0;
  disconnects = 0;
  loads = 0;
  closes = 0;
  activeSaves = 0;
  maxActiveSaves = 0;

  readonly assignments: Array<{ load: number; name: string; expression: string }> = [];
  readonly meshes: MeshParams[] = [];
  readonly saved: string[] = [];

  constructor(readonly options: FakeEngineOptions) {}

  /** Fail or hang when scripted to for this operation and load */
  async step(operation: FakeOperation, load: number, signal?: AbortSignal): Promise<void> {
    const hang = this.options.hangOn;
    if (hang && hang.operation === operation && hang.load === load) {
      await new Promise<never>((_, reject) => {
        signal?.addEventListener('abort', () => reject(signal?.reason), { once: true });
      });
    }
    if (this.options.failOn?.[operation]?.includes(load)) {
      throw new Error(`fake ${operation} failure on load ${load}`);
    }
  }

  async connect(): Promise<void> {
    if (this.options.connectError) throw this.options.connectError;
    this.connects++;
  }

  async load(_templatePath: string, signal?: AbortSignal): Promise<ModelSession> {
    this.loads++;
    const load = this.loads;
    await this.step('load', load, signal);
    return new FakeSession(this, load);
  }

  async disconnect(): Promise<void> {
    this.disconnects++;
  }
}

// =============================================================================
// FILESYSTEM
// =============================================================================

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'model-sweep-'));
}

export async function removeTempDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

// =============================================================================
// CONFIG
// =============================================================================

/**
 * Resolve a small two-by-two configuration writing into `outputDirectory`,
 * with `overrides` deep-merged over it.
 */
export function testConfig(outputDirectory: string, overrides: Record<string, unknown> = {}): BatchConfig {
  const base: Record<string, unknown> = {
    parameters: {
      K_ch: [2.5, 3.0],
      W_ch: [3.0, 4.0],
    },
    parameter_units: { K_ch: 'mm', W_ch: 'mm' },
    batch_filtering: { target_count: 100, seed: 7 },
    template_model: 'template.mph',
    output_directory: outputDirectory,
    execution_settings: { progress_interval: 2, timeout_seconds: 5 },
  };
  return parseConfig(deepMerge(base, overrides), '<test>');
}

// =============================================================================
// LOGS
// =============================================================================

export interface LogCapture {
  entries: LogEntry[];
  messages(level?: LogEntry['level']): string[];
  stop(): void;
}

/**
 * Silence console output and collect log entries until stop() is called.
 */
export function captureLogs(): LogCapture {
  const entries: LogEntry[] = [];
  Logger.setConsoleOutput(false);
  const detach = Logger.addListener(entry => entries.push(entry));

  return {
    entries,
    messages(level) {
      return entries.filter(e => level === undefined || e.level === level).map(e => e.message);
    },
    stop() {
      detach();
      Logger.setConsoleOutput(true);
    },
  };
}
