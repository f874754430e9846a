import { writable, type Readable } from 'svelte/store';
import { debugError, debugLog } from '../debug';
import type { SyncEvents } from '../events';

/**
 * - 'unreachable': no usable network
 * - 'constrained': online, but metered or low-data; small payloads only
 * - 'full': online without restrictions
 */
export type Reachability = 'unreachable' | 'constrained' | 'full';

export type InterfaceType = 'wifi' | 'cellular' | 'ethernet' | 'other' | 'none';

/** Raw platform report, fed by the host from its own network APIs. */
export interface ConnectivitySnapshot {
  online: boolean;
  constrained?: boolean; // Low-data mode
  expensive?: boolean; // Metered link (cellular, hotspot)
  interfaceType?: InterfaceType;
}

export interface ConnectivitySource {
  current(): ConnectivitySnapshot;
  subscribe(listener: (snapshot: ConnectivitySnapshot) => void): () => void;
}

export function classifyConnectivity(snapshot: ConnectivitySnapshot): Reachability {
  if (!snapshot.online) return 'unreachable';
  if (snapshot.constrained || snapshot.expensive) return 'constrained';
  return 'full';
}

/**
 * Connectivity source driven by explicit {@link ManualConnectivitySource.set}
 * calls. Hosts forward their platform's online/offline notifications here.
 */
export class ManualConnectivitySource implements ConnectivitySource {
  private snapshot: ConnectivitySnapshot;
  private readonly listeners = new Set<(snapshot: ConnectivitySnapshot) => void>();

  constructor(initial: ConnectivitySnapshot = { online: false, interfaceType: 'none' }) {
    this.snapshot = initial;
  }

  current(): ConnectivitySnapshot {
    return this.snapshot;
  }

  set(snapshot: ConnectivitySnapshot): void {
    this.snapshot = snapshot;
    for (const listener of this.listeners) listener(snapshot);
  }

  subscribe(listener: (snapshot: ConnectivitySnapshot) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}

// Callbacks can be sync or async
type TransitionCallback = (current: Reachability, previous: Reachability) => void | Promise<void>;

export interface ReachabilityMonitor extends Readable<Reachability> {
  start: () => void;
  stop: () => void;
  current: () => Reachability;
  interfaceType: () => InterfaceType;
  isReachable: () => boolean;
  allowsLargePayloads: () => boolean;
  onTransition: (callback: TransitionCallback) => () => void;
  /** Resolves once every transition callback fired so far has finished. */
  settled: () => Promise<void>;
}

export interface ReachabilityOptions {
  /** How long a new condition must persist before it is reported (ms). */
  debounceMs: number;
  events?: SyncEvents;
}

export function createReachabilityMonitor(
  source: ConnectivitySource,
  options: ReachabilityOptions
): ReachabilityMonitor {
  let stable: Reachability = classifyConnectivity(source.current());
  let lastSnapshot = source.current();
  const { subscribe, set } = writable<Reachability>(stable);
  const callbacks: Set<TransitionCallback> = new Set();
  let candidate: Reachability | null = null;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let unsubscribe: (() => void) | null = null;
  let callbackChain: Promise<void> = Promise.resolve();

  function clearTimer() {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
    candidate = null;
  }

  // Run callbacks sequentially, properly awaiting async ones
  async function runCallbacksSequentially(current: Reachability, previous: Reachability): Promise<void> {
    for (const callback of callbacks) {
      try {
        await callback(current, previous);
      } catch (e) {
        debugError('[NETWORK] Transition callback error:', e);
      }
    }
  }

  function commit(next: Reachability) {
    const previous = stable;
    stable = next;
    set(next);
    debugLog(`[NETWORK] ${previous} -> ${next}`);
    options.events?.emit('connectivityChanged', { previous, current: next });
    callbackChain = callbackChain.then(() => runCallbacksSequentially(next, previous));
  }

  function observe(snapshot: ConnectivitySnapshot) {
    lastSnapshot = snapshot;
    const next = classifyConnectivity(snapshot);

    // Flapped back before the debounce elapsed
    if (next === stable) {
      clearTimer();
      return;
    }
    if (next === candidate) return;

    clearTimer();
    candidate = next;
    timer = setTimeout(() => {
      timer = null;
      candidate = null;
      commit(next);
    }, options.debounceMs);
  }

  function start() {
    if (unsubscribe) return; // Idempotent
    lastSnapshot = source.current();
    stable = classifyConnectivity(lastSnapshot);
    set(stable);
    unsubscribe = source.subscribe(observe);
  }

  function stop() {
    unsubscribe?.();
    unsubscribe = null;
    clearTimer();
  }

  function onTransition(callback: TransitionCallback): () => void {
    callbacks.add(callback);
    return () => callbacks.delete(callback);
  }

  return {
    subscribe,
    start,
    stop,
    current: () => stable,
    interfaceType: () => lastSnapshot.interfaceType ?? (lastSnapshot.online ? 'other' : 'none'),
    isReachable: () => stable !== 'unreachable',
    allowsLargePayloads: () => stable === 'full',
    onTransition,
    settled: () => callbackChain
  };
}
