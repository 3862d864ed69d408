/**
 * Model Engine capability
 *
 * The orchestrator's only view of the external modeling software. One engine
 * connection per run, one loaded session at a time. Every call may fail;
 * the orchestrator always closes a loaded session and disconnects the engine.
 *
 * Long-running calls take the combination's AbortSignal and should stop, and
 * reject with its reason, once it fires.
 */

import type { MeshParams } from '../stages/mesh.js';

export interface ModelSession {
  /** Names of the parameters the loaded model declares */
  parameterNames(): Promise<string[]>;

  getParameter(name: string): Promise<string>;

  /** `expression` is a value with optional unit, e.g. "2.5[mm]" */
  setParameter(name: string, expression: string): Promise<void>;

  runMesh(mesh: MeshParams, signal?: AbortSignal): Promise<void>;

  /** Engine-reported mesh statistics, when available */
  meshStatistics?(): Promise<Record<string, number>>;

  save(path: string, signal?: AbortSignal): Promise<void>;

  close(): Promise<void>;
}

export interface ModelEngine {
  readonly name: string;

  connect(): Promise<void>;

  /** Load the template model into a fresh session */
  load(templatePath: string, signal?: AbortSignal): Promise<ModelSession>;

  disconnect(): Promise<void>;
}
