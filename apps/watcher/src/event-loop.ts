/**
 * Event Loop Driver
 *
 * Subscribes to runtime events and runs a sync cycle for every container
 * lifecycle event. Events are handled one at a time, so cycles never overlap.
 */

import { errorMessage, type Logger, type RawEvent } from '@dockwatch/core';
import type { RuntimeClient, SubscribeOptions } from '@dockwatch/docker';
import type { CycleResult, CycleTrigger, SyncCycle } from './sync-cycle';

export const LIFECYCLE_ACTIONS: ReadonlySet<string> = new Set(['start', 'die', 'destroy']);

export function isLifecycleEvent(event: RawEvent): boolean {
  return event.type === 'container' && LIFECYCLE_ACTIONS.has(event.action);
}

export interface EventLoopOptions {
  syncOnStart?: boolean;
}

/**
 * `stopped` after stop(); `closed` when the runtime ended the stream
 */
export type LoopExit = 'stopped' | 'closed';

export class EventLoopDriver {
  private abortController: AbortController | null = null;
  private logger: Logger;
  private syncOnStart: boolean;

  constructor(
    private runtime: RuntimeClient,
    private cycle: Pick<SyncCycle, 'run'>,
    logger: Logger,
    options: EventLoopOptions = {}
  ) {
    this.logger = logger.child({ component: 'event-loop' });
    this.syncOnStart = options.syncOnStart ?? true;
  }

  get running(): boolean {
    return this.abortController !== null;
  }

  /**
   * Run until stop() is called or the event stream closes
   * @throws RuntimeConnectionError if the subscription cannot be established or fails
   */
  async start(): Promise<LoopExit> {
    if (this.abortController) {
      throw new Error('Event loop is already running');
    }
    const controller = new AbortController();
    this.abortController = controller;

    try {
      const options: SubscribeOptions = {};
      if (this.syncOnStart) {
        // Replay whatever happens while the startup cycle runs
        options.since = Math.floor(Date.now() / 1000);
        await this.runCycle({ kind: 'startup' });
      }

      this.logger.info('Watching runtime events');
      for await (const event of this.runtime.subscribeEvents(controller.signal, options)) {
        await this.handleEvent(event);
        if (controller.signal.aborted) {
          break;
        }
      }
    } finally {
      this.abortController = null;
    }

    const exit: LoopExit = controller.signal.aborted ? 'stopped' : 'closed';
    this.logger.info('Event loop finished', { exit });
    return exit;
  }

  stop(): void {
    if (!this.abortController) {
      return;
    }
    this.logger.info('Stopping event loop');
    this.abortController.abort();
  }

  private async handleEvent(event: RawEvent): Promise<void> {
    const name = event.actor.attributes.name;

    if (!isLifecycleEvent(event)) {
      this.logger.debug('Ignoring runtime event', { type: event.type, action: event.action, name });
      return;
    }

    this.logger.info('Container lifecycle event', { action: event.action, name });
    await this.runCycle({ kind: 'event', action: event.action, name });
  }

  private async runCycle(trigger: CycleTrigger): Promise<void> {
    let result: CycleResult;
    try {
      result = await this.cycle.run(trigger);
    } catch (error) {
      this.logger.error('Unexpected error in sync cycle', { trigger, error: errorMessage(error) });
      return;
    }

    switch (result.status) {
      case 'changed':
        this.logger.info('Sync cycle changed services file', {
          trigger,
          added: result.added,
          reloaded: result.reload.ok,
        });
        break;
      case 'unchanged':
        this.logger.debug('Sync cycle made no changes', { trigger });
        break;
      case 'failed': {
        const meta = { trigger, code: result.error.code, error: result.error.message };
        if (result.error.code === 'CONFLICT') {
          this.logger.warn('Services file modified concurrently, skipping update', meta);
        } else {
          this.logger.error('Sync cycle failed', meta);
        }
        break;
      }
    }
  }
}
