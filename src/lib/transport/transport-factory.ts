import { HANDLER_LIFETIME_MS, RETIRED_HANDLER_GRACE_MS } from '../constants/defaults.js';
import { debugTransport } from '../utils/debug.js';
import { PooledConnectionHandler, type PrimaryHandler } from './handlers.js';
import { HttpTransport } from './http-transport.js';
import type { Middleware } from './middleware.js';

/**
 * Mutable state handed to builder actions while a transport is assembled.
 */
export interface TransportBuilder {
  readonly name: string;
  primaryHandler: PrimaryHandler;
  /** Outermost first */
  readonly additionalHandlers: Middleware[];
}

export type TransportBuilderAction = (builder: TransportBuilder) => void;
export type TransportClientAction = (transport: HttpTransport) => void;

/**
 * Per-name options collected from the configurators before a transport is built.
 */
export interface TransportFactoryOptions {
  /** Run in order on the transport once its handler chain is assembled */
  readonly clientActions: TransportClientAction[];
  /** Run in order on the builder before the transport is created */
  readonly builderActions: TransportBuilderAction[];
}

/**
 * Hooks invoked for every transport name the factory builds. All `configure` hooks run
 * before any `postConfigure` hook.
 */
export interface TransportConfigurator {
  configure?(name: string, options: TransportFactoryOptions): void | Promise<void>;
  postConfigure?(name: string, options: TransportFactoryOptions): void | Promise<void>;
}

export interface TransportFactorySettings {
  configurators?: TransportConfigurator[];
  /** Defaults to a PooledConnectionHandler */
  createPrimaryHandler?: () => PrimaryHandler;
  /** How long a built transport is reused before the next request rebuilds it */
  handlerLifetimeMs?: number;
  /** How long an expired transport stays open for callers still holding it */
  retiredHandlerGraceMs?: number;
  userAgent?: string;
  now?: () => number;
}

interface CacheEntry {
  transport: Promise<HttpTransport>;
  createdAt: number;
}

/**
 * Builds and caches HttpTransport instances by name.
 *
 * At most one build is in flight per name; concurrent callers share it. A build that fails
 * is evicted so the next call retries it. The handler of an expired transport is closed once
 * `retiredHandlerGraceMs` has passed.
 */
export class TransportFactory {
  private readonly configurators: TransportConfigurator[];
  private readonly createPrimaryHandler: () => PrimaryHandler;
  private readonly handlerLifetimeMs: number;
  private readonly retiredHandlerGraceMs: number;
  private readonly userAgent?: string;
  private readonly now: () => number;
  private readonly entries = new Map<string, CacheEntry>();
  private readonly retired = new Map<Promise<HttpTransport>, NodeJS.Timeout>();

  constructor(settings: TransportFactorySettings = {}) {
    this.configurators = [...(settings.configurators ?? [])];
    this.createPrimaryHandler = settings.createPrimaryHandler ?? (() => new PooledConnectionHandler());
    this.handlerLifetimeMs = settings.handlerLifetimeMs ?? HANDLER_LIFETIME_MS;
    this.retiredHandlerGraceMs = settings.retiredHandlerGraceMs ?? RETIRED_HANDLER_GRACE_MS;
    this.userAgent = settings.userAgent;
    this.now = settings.now ?? Date.now;
  }

  addConfigurator(configurator: TransportConfigurator): this {
    this.configurators.push(configurator);
    return this;
  }

  getTransport(name = ''): Promise<HttpTransport> {
    const existing = this.entries.get(name);
    if (existing && this.now() - existing.createdAt < this.handlerLifetimeMs) {
      return existing.transport;
    }
    if (existing) {
      debugTransport('transport %j expired, rebuilding', name);
      this.retire(existing.transport);
    }

    const entry: CacheEntry = { transport: this.build(name), createdAt: this.now() };
    this.entries.set(name, entry);

    void entry.transport.catch(() => {
      if (this.entries.get(name) === entry) {
        this.entries.delete(name);
      }
    });

    return entry.transport;
  }

  /**
   * Closes the dispatchers of every transport built so far.
   */
  async dispose(): Promise<void> {
    for (const timer of this.retired.values()) {
      clearTimeout(timer);
    }
    const transports = [
      ...this.retired.keys(),
      ...[...this.entries.values()].map((entry) => entry.transport),
    ];
    this.entries.clear();
    this.retired.clear();

    const settled = await Promise.allSettled(transports);
    await Promise.all(
      settled.map((result) =>
        result.status === 'fulfilled' ? result.value.primaryHandler.close() : undefined,
      ),
    );
  }

  private retire(transport: Promise<HttpTransport>): void {
    const timer = setTimeout(() => {
      this.retired.delete(transport);
      void this.closeRetired(transport);
    }, this.retiredHandlerGraceMs);
    timer.unref();
    this.retired.set(transport, timer);
  }

  private async closeRetired(transport: Promise<HttpTransport>): Promise<void> {
    try {
      const { name, primaryHandler } = await transport;
      await primaryHandler.close();
      debugTransport('closed the handler of expired transport %j', name);
    } catch (error) {
      debugTransport(
        'failed to close an expired handler: %s',
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private async build(name: string): Promise<HttpTransport> {
    const options: TransportFactoryOptions = { clientActions: [], builderActions: [] };

    for (const configurator of this.configurators) {
      await configurator.configure?.(name, options);
    }
    for (const configurator of this.configurators) {
      await configurator.postConfigure?.(name, options);
    }

    const builder: TransportBuilder = {
      name,
      primaryHandler: this.createPrimaryHandler(),
      additionalHandlers: [],
    };
    for (const action of options.builderActions) {
      action(builder);
    }

    const transport = new HttpTransport({
      name,
      primaryHandler: builder.primaryHandler,
      additionalHandlers: builder.additionalHandlers,
      userAgent: this.userAgent,
    });
    for (const action of options.clientActions) {
      action(transport);
    }

    debugTransport(
      'built transport %j (handler=%s, additionalHandlers=%d)',
      name,
      builder.primaryHandler.handlerType,
      builder.additionalHandlers.length,
    );

    return transport;
  }
}
