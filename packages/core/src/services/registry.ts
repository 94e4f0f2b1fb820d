/**
 * Service Registry
 *
 * Process-wide container for the log, event bus, agent registry and
 * engine. The host application fills it at startup; core code only reads
 * from it (see getLog).
 *
 *   initServiceRegistry().register(Services.Log, log);
 *   getServiceRegistry().get(Services.Engine).status(planId);
 */

/**
 * Typed registry key. Instances are stored on the token itself, keyed by
 * registry, so lookups keep the token's type without a cast.
 */
export class ServiceToken<T> {
  private readonly bindings = new WeakMap<ServiceRegistry, { readonly instance: T }>();

  constructor(readonly name: string) {}

  /** @internal */
  bind(registry: ServiceRegistry, instance: T): void {
    this.bindings.set(registry, { instance });
  }

  /** @internal */
  unbind(registry: ServiceRegistry): void {
    this.bindings.delete(registry);
  }

  /** @internal */
  lookup(registry: ServiceRegistry): { readonly instance: T } | undefined {
    return this.bindings.get(registry);
  }

  toString(): string {
    return `ServiceToken(${this.name})`;
  }
}

export interface RegisterOptions<T> {
  /** Teardown run by dispose(), latest registration first */
  dispose?: (instance: T) => void | Promise<void>;
}

interface Entry {
  release(): void;
  teardown?: () => void | Promise<void>;
}

export class ServiceRegistry {
  private readonly entries = new Map<string, Entry>();

  /**
   * Register (or replace) the instance behind a token.
   */
  register<T>(token: ServiceToken<T>, instance: T, options: RegisterOptions<T> = {}): void {
    this.entries.get(token.name)?.release();
    this.entries.delete(token.name);

    token.bind(this, instance);
    const { dispose } = options;
    this.entries.set(token.name, {
      release: () => token.unbind(this),
      ...(dispose ? { teardown: () => dispose(instance) } : {}),
    });
  }

  get<T>(token: ServiceToken<T>): T {
    const binding = token.lookup(this);
    if (!binding) {
      throw new Error(`Service '${token.name}' not registered; register it during startup`);
    }
    return binding.instance;
  }

  tryGet<T>(token: ServiceToken<T>): T | null {
    return token.lookup(this)?.instance ?? null;
  }

  has<T>(token: ServiceToken<T>): boolean {
    return token.lookup(this) !== undefined;
  }

  /** Registered service names, in registration order */
  names(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Run teardowns newest first, then forget every service. A failing
   * teardown is reported and the rest still run.
   */
  async dispose(): Promise<void> {
    const entries = [...this.entries.entries()].reverse();
    this.entries.clear();
    for (const [name, entry] of entries) {
      entry.release();
      if (!entry.teardown) continue;
      try {
        await entry.teardown();
      } catch (error) {
        console.warn(`[ServiceRegistry] teardown of '${name}' failed:`, error);
      }
    }
  }
}

// ============================================================================
// Process-wide instance
// ============================================================================

let current: ServiceRegistry | null = null;

/**
 * Create the process-wide registry. Throws if one exists already.
 */
export function initServiceRegistry(): ServiceRegistry {
  if (current) {
    throw new Error('ServiceRegistry already initialized; call resetServiceRegistry() first');
  }
  current = new ServiceRegistry();
  return current;
}

export function getServiceRegistry(): ServiceRegistry {
  if (!current) {
    throw new Error('ServiceRegistry not initialized; call initServiceRegistry() at startup');
  }
  return current;
}

export function hasServiceRegistry(): boolean {
  return current !== null;
}

/**
 * Dispose and drop the process-wide registry. Used by shutdown and tests.
 */
export async function resetServiceRegistry(): Promise<void> {
  const registry = current;
  current = null;
  await registry?.dispose();
}
