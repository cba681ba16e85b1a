import { mkdirSync, rmSync } from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { OverlayError, describeError } from '../errors.js';
import { BuildReport, LayerPlan, OverlayEnvironment } from '../types.js';
import { BuildHooks, buildOverlay } from './builder.js';
import { publishEnvironment } from './environment.js';
import { mergeOrder } from '../layers/resolver.js';

export type OverlayState = 'uninitialized' | 'allocated' | 'populated' | 'released';

export type TerminationEvent = 'SIGINT' | 'SIGTERM' | 'exit';

/**
 * The part of `process` the scope listens on. Tests pass an EventEmitter.
 */
export interface TerminationSource {
  on(event: TerminationEvent, listener: () => void): unknown;
  removeListener(event: TerminationEvent, listener: () => void): unknown;
}

export interface OverlayScopeOptions {
  /** Directory the overlay is allocated in; created when missing */
  parentDir: string;
  source?: TerminationSource;
  exit?: (code: number) => void;
  pid?: number;
  onReleaseError?: (error: unknown, dir: string) => void;
}

/** Prefix of every overlay directory name: `merge-<pid>-<uuid>` */
export const OVERLAY_DIR_PREFIX = 'merge-';

export function overlayDirName(pid: number): string {
  return `${OVERLAY_DIR_PREFIX}${pid}-${uuidv4()}`;
}

/**
 * Owns one ephemeral overlay directory for the life of the process.
 *
 * States: uninitialized -> allocated -> populated -> released.
 * Release happens exactly once: explicitly, on SIGINT/SIGTERM (followed by
 * exit(0)), or when the process exits. A release during population aborts
 * the walk and waits for its last filesystem call to settle before removing
 * the directory. The `exit` event cannot wait, so it removes what is there.
 */
export class OverlayScope {
  private currentState: OverlayState = 'uninitialized';
  private dir: string | null = null;
  private readonly source: TerminationSource;
  private readonly exit: (code: number) => void;
  private readonly pid: number;
  private readonly population = new AbortController();
  /** Settles (never rejects) once the running walk has no call in flight */
  private walk: Promise<void> | null = null;
  private releasing: Promise<boolean> | null = null;

  private readonly handleSignal = async (): Promise<void> => {
    await this.release();
    this.exit(0);
  };

  private readonly handleExit = (): void => {
    if (this.releasing === null) {
      this.releasing = Promise.resolve(true);
    }
    this.markReleased();
    this.detach();
    this.removeDirectory();
  };

  constructor(private readonly options: OverlayScopeOptions) {
    this.source = options.source ?? process;
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.pid = options.pid ?? process.pid;
  }

  get state(): OverlayState {
    return this.currentState;
  }

  get path(): string {
    if (this.dir === null || this.currentState === 'released') {
      throw new OverlayError('INVALID_STATE', `Overlay is not available (state: ${this.currentState})`);
    }
    return this.dir;
  }

  /**
   * Create the overlay directory and start listening for termination.
   */
  allocate(): string {
    if (this.currentState !== 'uninitialized') {
      throw new OverlayError('INVALID_STATE', `Cannot allocate an overlay in state ${this.currentState}`);
    }

    mkdirSync(this.options.parentDir, { recursive: true });
    const dir = path.join(this.options.parentDir, overlayDirName(this.pid));
    mkdirSync(dir);

    this.dir = dir;
    this.currentState = 'allocated';

    this.source.on('SIGINT', this.handleSignal);
    this.source.on('SIGTERM', this.handleSignal);
    this.source.on('exit', this.handleExit);

    return dir;
  }

  /**
   * Merge the layers into the overlay. Allowed once, right after allocation.
   */
  async populate(layers: readonly string[], hooks?: BuildHooks): Promise<BuildReport> {
    if (this.currentState !== 'allocated' || this.walk !== null) {
      throw new OverlayError('INVALID_STATE', `Cannot populate an overlay in state ${this.currentState}`);
    }

    const build = buildOverlay(layers, this.path, { ...hooks, signal: this.population.signal });
    this.walk = build.then(
      () => undefined,
      () => undefined
    );

    const report = await build;
    this.population.signal.throwIfAborted();
    this.currentState = 'populated';
    return report;
  }

  /**
   * Remove the overlay directory, whatever it contains. Idempotent: later
   * calls wait for the first one to finish.
   *
   * @returns true when this call performed the release
   */
  async release(): Promise<boolean> {
    if (this.releasing !== null) {
      await this.releasing;
      return false;
    }
    this.releasing = this.performRelease();
    return this.releasing;
  }

  private async performRelease(): Promise<boolean> {
    this.markReleased();
    this.source.removeListener('SIGINT', this.handleSignal);
    this.source.removeListener('SIGTERM', this.handleSignal);

    // The exit listener stays until the directory is gone
    if (this.walk !== null) {
      await this.walk;
    }
    this.removeDirectory();
    this.detach();
    return true;
  }

  private detach(): void {
    this.source.removeListener('SIGINT', this.handleSignal);
    this.source.removeListener('SIGTERM', this.handleSignal);
    this.source.removeListener('exit', this.handleExit);
  }

  private markReleased(): void {
    if (this.currentState === 'released') return;
    this.currentState = 'released';
    this.population.abort(
      new OverlayError('INVALID_STATE', 'Overlay was released while it was being populated')
    );
  }

  private removeDirectory(): void {
    const dir = this.dir;
    if (dir === null) return;
    this.dir = null;

    try {
      rmSync(dir, { recursive: true, force: true });
    } catch (error) {
      const report = this.options.onReleaseError
        ?? ((err: unknown, target: string) => console.error(`[WARN] Failed to remove overlay ${target}: ${describeError(err)}`));
      report(error, dir);
    }
  }
}

export interface OverlayRequest {
  plan: LayerPlan;
  hooks?: BuildHooks;
  scope: OverlayScopeOptions;
}

export interface OverlaySession {
  environment: OverlayEnvironment;
  report: BuildReport;
}

/**
 * Build the overlay for a plan, hand the published environment to `fn`,
 * and release the overlay when `fn` settles.
 */
export async function withOverlay<T>(
  request: OverlayRequest,
  fn: (session: OverlaySession) => Promise<T>
): Promise<T> {
  const scope = new OverlayScope(request.scope);
  try {
    const dir = scope.allocate();
    const report = await scope.populate(mergeOrder(request.plan), request.hooks);
    const environment = publishEnvironment(dir, request.plan.configPaths);
    return await fn({ environment, report });
  } finally {
    await scope.release();
  }
}
