import { toJsonSchema } from '../core/parameter-schema.js';
import { currentRecursionLevel } from '../core/recursion-guard.js';
import type { DelegationConfig } from '../types/delegation.js';
import type { Host, SessionHandle, TemplateEngine, ToolFunction } from '../types/host.js';
import { logThought } from '../utils/logger.js';
import { DelegationHandler } from './delegation-handler.js';
import type { DelegationJournal } from './delegation-journal.js';
import { ParallelOrchestrator } from './parallel-orchestrator.js';

export interface DelegationToolDependencies {
  host: Host;
  engine?: TemplateEngine;
  journal?: DelegationJournal;
  orchestrator?: ParallelOrchestrator;
}

/**
 * One configured delegate tool. Holds the live configuration and one handler
 * per session that has requested the tool.
 */
export class DelegationToolInstance {
  readonly id: string;
  readonly #deps: DelegationToolDependencies;
  readonly #handlers = new Map<string, DelegationHandler>();
  readonly #onDispose: (instance: DelegationToolInstance) => void;
  #config: DelegationConfig;
  #disposed = false;

  constructor(
    id: string,
    config: DelegationConfig,
    deps: DelegationToolDependencies,
    onDispose: (instance: DelegationToolInstance) => void,
  ) {
    this.id = id;
    this.#config = config;
    this.#deps = deps;
    this.#onDispose = onDispose;
  }

  get config(): DelegationConfig {
    return this.#config;
  }

  get isDisposed(): boolean {
    return this.#disposed;
  }

  get sessionCount(): number {
    return this.#handlers.size;
  }

  /** Applies to delegate calls that start after this point. */
  updateConfig(config: DelegationConfig): void {
    this.#config = config;
  }

  /**
   * Tools to expose on `session`: the delegate function, or nothing once the
   * session already sits at the recursion limit.
   */
  async getToolFunctions(session: SessionHandle): Promise<ToolFunction[]> {
    if (this.#disposed) {
      return [];
    }

    const config = this.#config;
    const level = await currentRecursionLevel(session, this.#deps.host);
    if (level >= config.maxRecursionLevel) {
      void logThought(
        `[Delegation] Hiding '${config.functionName}' from session ${session.id} at recursion level ${level}.`,
      );
      return [];
    }

    const handler = this.handlerFor(session);
    return [
      {
        definition: {
          name: config.functionName,
          description: config.functionDescription,
          parameters: toJsonSchema(config.inputParameters),
          params: config.inputParameters,
        },
        invoke: (args) => handler.delegate(args),
      },
    ];
  }

  handlerFor(session: SessionHandle): DelegationHandler {
    const existing = this.#handlers.get(session.id);
    if (existing) {
      return existing;
    }

    const handler = new DelegationHandler({
      host: this.#deps.host,
      config: () => this.#config,
      contextSession: session,
      engine: this.#deps.engine,
      journal: this.#deps.journal,
      orchestrator: this.#deps.orchestrator,
    });
    this.#handlers.set(session.id, handler);
    return handler;
  }

  closeSession(sessionId: string): boolean {
    return this.#handlers.delete(sessionId);
  }

  dispose(): void {
    if (this.#disposed) {
      return;
    }
    this.#disposed = true;
    this.#handlers.clear();
    this.#onDispose(this);
  }
}

/** Live instances by id, so configuration edits reach every open tool. */
export class DelegationToolRegistry {
  readonly #deps: DelegationToolDependencies;
  readonly #instances = new Map<string, Set<DelegationToolInstance>>();

  constructor(deps: DelegationToolDependencies) {
    this.#deps = {
      ...deps,
      orchestrator: deps.orchestrator ?? new ParallelOrchestrator({ journal: deps.journal }),
    };
  }

  create(instanceId: string, config: DelegationConfig): DelegationToolInstance {
    const instance = new DelegationToolInstance(instanceId, config, this.#deps, (disposed) =>
      this.#unregister(disposed),
    );
    const bucket = this.#instances.get(instanceId) ?? new Set<DelegationToolInstance>();
    bucket.add(instance);
    this.#instances.set(instanceId, bucket);
    return instance;
  }

  get(instanceId: string): DelegationToolInstance[] {
    return [...(this.#instances.get(instanceId) ?? [])];
  }

  /** Returns how many live instances received the new configuration. */
  updateConfig(instanceId: string, config: DelegationConfig): number {
    const bucket = this.#instances.get(instanceId);
    if (!bucket) {
      return 0;
    }
    for (const instance of bucket) {
      instance.updateConfig(config);
    }
    void logThought(`[Delegation] Updated configuration of ${bucket.size} instance(s) of '${instanceId}'.`);
    return bucket.size;
  }

  delete(instanceId: string): boolean {
    const bucket = this.#instances.get(instanceId);
    if (!bucket) {
      return false;
    }
    this.#instances.delete(instanceId);
    for (const instance of bucket) {
      instance.dispose();
    }
    return true;
  }

  #unregister(instance: DelegationToolInstance): void {
    const bucket = this.#instances.get(instance.id);
    if (!bucket) {
      return;
    }
    bucket.delete(instance);
    if (bucket.size === 0) {
      this.#instances.delete(instance.id);
    }
  }
}
