/**
 * @fileoverview The publisher daemon: a single background loop that runs one
 * scheduling cycle every poll interval under a stored upstream credential.
 *
 * There is no inbound request to scope a credential, so each tick borrows any
 * grant from the credential store and installs it in the daemon's own
 * credential context, inside the daemon's worker lane. The loop never dies:
 * a missing grant skips the tick and any other failure is logged.
 * @module src/services/scheduling/publisherDaemon
 */
import { accessSync, constants } from 'fs';
import { dirname, resolve } from 'path';

import { Credential } from '@/ambient/credential.js';
import type { CredentialContext } from '@/ambient/credentialContext.js';
import { runInWorkerLane } from '@/ambient/workerLane.js';
import {
  JsonRpcErrorCode,
  McpError,
  isMcpErrorWithCode,
} from '@/types-global/errors.js';
import {
  ErrorHandler,
  getErrorMessage,
  logger,
  requestContextService,
  type RequestContext,
} from '@/utils/index.js';

import type {
  DaemonState,
  DaemonStats,
  PublisherDaemonOptions,
  TickOutcome,
} from './types.js';

export class PublisherDaemon {
  private readonly options: PublisherDaemonOptions;
  private readonly intervalMs: number;

  private currentState: DaemonState = 'idle';
  private running = false;
  private generation = 0;
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<TickOutcome> | undefined;
  private readonly counters: DaemonStats = {
    ticks: 0,
    successes: 0,
    skips: 0,
    failures: 0,
  };

  constructor(options: PublisherDaemonOptions) {
    if (
      !Number.isFinite(options.pollIntervalSeconds) ||
      options.pollIntervalSeconds <= 0
    ) {
      throw new McpError(
        JsonRpcErrorCode.ConfigurationError,
        `Poll interval must be a positive number of seconds, got ${options.pollIntervalSeconds}.`,
      );
    }
    this.options = options;
    this.intervalMs = options.pollIntervalSeconds * 1000;
  }

  public get state(): DaemonState {
    return this.currentState;
  }

  public get isRunning(): boolean {
    return this.running;
  }

  public get credentials(): CredentialContext {
    return this.options.credentials;
  }

  public get stats(): Readonly<DaemonStats> {
    return { ...this.counters };
  }

  /**
   * Verifies the storage directory is writable, runs the first tick
   * immediately and schedules the rest.
   * @throws {McpError} `InitializationFailed` if the check fails; the loop is
   *   not started.
   */
  public start(): void {
    const context = requestContextService.createRequestContext({
      operation: 'PublisherDaemon.start',
      workerId: this.options.workerId,
    });
    if (this.running) {
      logger.warning('Publisher daemon is already running.', context);
      return;
    }

    this.preflight(context);

    this.running = true;
    const generation = ++this.generation;
    this.currentState = 'awaiting_tick';
    logger.info(
      `Publisher daemon started; polling every ${this.options.pollIntervalSeconds}s.`,
      { ...context, pollIntervalSeconds: this.options.pollIntervalSeconds },
    );
    this.runAndReschedule(generation);
  }

  /**
   * Cancels the pending timer, waits for an in-flight tick and releases the
   * daemon's resources.
   */
  public async stop(): Promise<void> {
    const wasRunning = this.running;
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.currentState = 'idle';
    this.options.resources?.closeAll();
    if (wasRunning) {
      logger.info(
        'Publisher daemon stopped.',
        requestContextService.createRequestContext({
          operation: 'PublisherDaemon.stop',
          workerId: this.options.workerId,
        }),
      );
    }
  }

  /**
   * Runs one tick. Never rejects. A call made while a tick is running returns
   * that tick's result instead of starting another.
   */
  public tick(): Promise<TickOutcome> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const pending = this.executeTick().finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = pending;
    return pending;
  }

  private runAndReschedule(generation: number): void {
    void this.tick().then(() => {
      if (!this.running || generation !== this.generation) {
        return;
      }
      this.timer = setTimeout(() => {
        this.timer = undefined;
        this.runAndReschedule(generation);
      }, this.intervalMs);
      this.timer.unref();
    });
  }

  private preflight(context: RequestContext): void {
    let storagePath: string | undefined;
    try {
      storagePath = resolve(this.options.storageEngine.resolveStoragePath());
      accessSync(dirname(storagePath), constants.W_OK);
    } catch (error) {
      throw ErrorHandler.handleError(
        new McpError(
          JsonRpcErrorCode.InitializationFailed,
          `Publisher daemon cannot start: storage directory is not writable (${getErrorMessage(error)}).`,
          { storagePath },
          { cause: error },
        ),
        { operation: 'PublisherDaemon.preflight', context, critical: true },
      );
    }
  }

  private async resolveCredential(): Promise<Credential> {
    const stored = await this.options.credentialStore.findAnyStoredCredential(
      this.options.upstreamTokenKey,
    );
    if (!stored) {
      throw new McpError(
        JsonRpcErrorCode.NoCredentialAvailable,
        `No stored credential under '${this.options.upstreamTokenKey}'.`,
      );
    }
    return Credential.create(stored);
  }

  private async executeTick(): Promise<TickOutcome> {
    const tickNumber = this.counters.ticks + 1;
    const context = requestContextService.createRequestContext({
      operation: 'PublisherDaemon.tick',
      workerId: this.options.workerId,
      tick: tickNumber,
    });
    this.currentState = 'running_unit';
    this.counters.ticks = tickNumber;
    this.counters.lastTickAt = context.timestamp;

    let outcome: TickOutcome;
    try {
      const credential = await this.resolveCredential();
      await runInWorkerLane(this.options.workerId, () =>
        this.options.credentials.run(credential, () =>
          this.options.workUnit.runOneSchedulingCycle(),
        ),
      );
      outcome = 'success';
      this.counters.successes++;
      logger.debug('Scheduling cycle completed.', {
        ...context,
        ...(credential.subjectId !== undefined
          ? { subjectId: credential.subjectId }
          : {}),
      });
    } catch (error) {
      if (isMcpErrorWithCode(error, JsonRpcErrorCode.NoCredentialAvailable)) {
        outcome = 'skipped';
        this.counters.skips++;
        logger.debug(
          'No stored credential; skipping this scheduling cycle.',
          context,
        );
      } else {
        outcome = 'failed';
        this.counters.failures++;
        ErrorHandler.handleError(
          new McpError(
            JsonRpcErrorCode.WorkUnitFailure,
            `Scheduling cycle failed: ${getErrorMessage(error)}`,
            { workerId: this.options.workerId, tick: tickNumber },
            { cause: error },
          ),
          { operation: 'PublisherDaemon.tick', context },
        );
      }
    }

    this.counters.lastOutcome = outcome;
    this.currentState = this.running ? 'awaiting_tick' : 'idle';
    return outcome;
  }
}
