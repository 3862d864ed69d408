/**
 * Dry-run engine
 *
 * Walks the whole workflow without modeling software: parameters are held in
 * memory and save() writes a plain-text placeholder describing what a real
 * engine would have produced.
 */

import { writeFile } from 'fs/promises';
import type { MeshParams } from '../stages/mesh.js';
import type { ModelEngine, ModelSession } from './types.js';

export interface DryRunOptions {
  /** Parameters the simulated template declares */
  knownParameters: readonly string[];
}

class DryRunSession implements ModelSession {
  private readonly values = new Map<string, string>();
  private mesh: MeshParams | undefined;

  constructor(private readonly templatePath: string, knownParameters: readonly string[]) {
    for (const name of knownParameters) {
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

  async meshStatistics(): Promise<Record<string, number>> {
    if (!this.mesh) return {};
    const stats: Record<string, number> = { interiorMeshSize: this.mesh.interiorMeshSize };
    for (const [axis, info] of Object.entries(this.mesh.axes)) {
      stats[`${axis}Cells`] = info.cells;
    }
    return stats;
  }

  async save(path: string, signal?: AbortSignal): Promise<void> {
    const lines = [
      '# Model file (dry run)',
      `# Template: ${this.templatePath}`,
      `# Parameters: ${JSON.stringify(Object.fromEntries(this.values))}`,
      `# Mesh: ${JSON.stringify(this.mesh ?? null)}`,
    ];
    await writeFile(path, lines.join('\n') + '\n', { encoding: 'utf-8', signal });
  }

  async close(): Promise<void> {
    this.values.clear();
    this.mesh = undefined;
  }
}

export class DryRunEngine implements ModelEngine {
  readonly name = 'dry-run';

  constructor(private readonly options: DryRunOptions) {}

  async connect(): Promise<void> {}

  async load(templatePath: string): Promise<ModelSession> {
    return new DryRunSession(templatePath, this.options.knownParameters);
  }

  async disconnect(): Promise<void> {}
}
