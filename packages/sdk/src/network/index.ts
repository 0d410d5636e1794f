/**
 * Connectivity monitor - reports reachability and notifies on transitions
 * @module network
 */

import { BehaviorSubject, Observable, Subscription, distinctUntilChanged, map, skip } from 'rxjs';
import type { FetchLike } from '../gateway/http.js';
import { createLogger, type Logger } from '../logger.js';

/**
 * Connectivity transitions
 */
export enum ConnectivityEvent {
  ONLINE = 'online',
  OFFLINE = 'offline',
}

/**
 * Configuration for the connectivity monitor
 */
export interface ConnectivityMonitorConfig {
  /**
   * State before any signal arrives. Defaults to `navigator.onLine` where it
   * exists, otherwise connected.
   */
  initiallyConnected?: boolean;
  /** URL probed by revalidate(); without one the current state is kept */
  pingUrl?: string;
  /** Probe interval while the host claims connectivity the probe denies */
  pingInterval?: number;
  pingTimeout?: number;
  /** Listen to the browser's online/offline events when a window exists */
  listenToWindow?: boolean;
  fetch?: FetchLike;
  logger?: Logger;
}

function hostOnline(): boolean {
  return typeof navigator !== 'undefined' && typeof navigator.onLine === 'boolean'
    ? navigator.onLine
    : true;
}

/**
 * Connectivity monitor
 *
 * Host signals are taken at face value until a push or pull fails; the
 * orchestrator then calls `revalidate()`, which probes the ping URL and keeps
 * probing until it succeeds.
 */
export class ConnectivityMonitor {
  private config: Required<Omit<ConnectivityMonitorConfig, 'logger' | 'initiallyConnected'>>;
  private logger: Logger;
  private connectedSubject: BehaviorSubject<boolean>;
  private subscriptions: Subscription[] = [];
  private pingTimer?: ReturnType<typeof setInterval>;
  private abortController?: AbortController;
  private destroyed = false;

  constructor(config: ConnectivityMonitorConfig = {}) {
    this.config = {
      pingUrl: '',
      pingInterval: 30000,
      pingTimeout: 5000,
      listenToWindow: true,
      fetch: (input, init) => fetch(input, init),
      ...config,
    };
    this.logger = config.logger ?? createLogger({ name: 'tidesync:network' });
    this.connectedSubject = new BehaviorSubject(config.initiallyConnected ?? hostOnline());
    this.init();
  }

  /**
   * Initialize browser event listeners
   */
  private init(): void {
    if (this.config.listenToWindow && typeof window !== 'undefined') {
      window.addEventListener('online', this.handleOnline);
      window.addEventListener('offline', this.handleOffline);
    }
  }

  private handleOnline = (): void => {
    this.setConnected(true);
  };

  private handleOffline = (): void => {
    this.setConnected(false);
  };

  /**
   * Point-in-time reachability
   */
  isConnected(): boolean {
    return this.connectedSubject.value;
  }

  /**
   * Online/offline transitions
   */
  onChange(): Observable<ConnectivityEvent> {
    return this.connectedSubject.pipe(
      distinctUntilChanged(),
      skip(1),
      map((connected) => (connected ? ConnectivityEvent.ONLINE : ConnectivityEvent.OFFLINE))
    );
  }

  /**
   * Follow a boolean connectivity signal supplied by the host platform
   */
  attach(signal$: Observable<boolean>): Subscription {
    const subscription = signal$.subscribe({
      next: (connected) => this.setConnected(connected),
      error: (error: unknown) =>
        this.logger.warn({ err: error }, 'Connectivity signal failed'),
    });
    this.subscriptions.push(subscription);
    return subscription;
  }

  /**
   * Report connectivity from the host
   */
  setConnected(connected: boolean): void {
    if (this.destroyed) {
      return;
    }
    // A fresh host signal supersedes an earlier failed probe
    this.stopPing();
    this.update(connected);
  }

  /**
   * Probe the ping URL and update the state to match
   */
  async revalidate(): Promise<boolean> {
    if (!this.config.pingUrl || this.destroyed) {
      return this.isConnected();
    }

    const reachable = await this.probe();
    if (this.destroyed) {
      return reachable;
    }

    this.update(reachable);
    if (reachable) {
      this.stopPing();
    } else {
      this.startPing();
    }
    return reachable;
  }

  /**
   * Cleanup and remove event listeners
   */
  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.stopPing();

    if (typeof window !== 'undefined') {
      window.removeEventListener('online', this.handleOnline);
      window.removeEventListener('offline', this.handleOffline);
    }

    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions = [];
    this.connectedSubject.complete();
  }

  private update(connected: boolean): void {
    if (connected !== this.connectedSubject.value) {
      this.logger.info({ connected }, 'Connectivity changed');
      this.connectedSubject.next(connected);
    }
  }

  private startPing(): void {
    if (this.pingTimer) {
      return;
    }
    this.pingTimer = setInterval(() => {
      void this.revalidate();
    }, this.config.pingInterval);
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = undefined;
    }
    if (this.abortController) {
      this.abortController.abort();
      this.abortController = undefined;
    }
  }

  private async probe(): Promise<boolean> {
    const controller = new AbortController();
    this.abortController = controller;
    const timeout = setTimeout(() => controller.abort(), this.config.pingTimeout);

    try {
      const response = await this.config.fetch(this.config.pingUrl, {
        method: 'HEAD',
        cache: 'no-cache',
        signal: controller.signal,
      });
      return response.ok;
    } catch (error) {
      this.logger.debug({ err: error, url: this.config.pingUrl }, 'Ping failed');
      return false;
    } finally {
      clearTimeout(timeout);
      if (this.abortController === controller) {
        this.abortController = undefined;
      }
    }
  }
}
