import { randomUUID } from "node:crypto";
import pino, { type Logger } from "pino";
import type { UnknownAction } from "./action-schema.ts";
import type { OfficeBridge } from "./bridge/api.ts";
import { BridgeError, isBridgeUnavailable } from "./bridge/errors.ts";
import type { DispatchErrorCode, WorkbookSession } from "./dispatcher/command-dispatcher.ts";
import { CommandDispatcher, createWorkbookSession } from "./dispatcher/command-dispatcher.ts";
import type { Observation } from "./observation.ts";
import { failureObservation, successObservation, withObservationFields } from "./observation.ts";

export const SUCCESS_REWARD = 1.0;
export const FAILURE_REWARD = -0.1;

const DEFAULT_CONNECT_ATTEMPTS = 10;
const DEFAULT_CONNECT_DELAY_MS = 1500;

export interface EnvironmentState {
  episode_id: string;
  step_count: number;
}

/**
 * Anything that can execute one action and report the observation: the local
 * environment or a remote client.
 */
export interface StepRunner {
  step(action: UnknownAction): Promise<Observation>;
}

export interface CalcEnvironmentOptions {
  bridge: OfficeBridge;
  /** Document opened at every reset, if set. */
  baseFile?: string | null;
  /** Path the workbook is saved to on close, if set. */
  goalFile?: string | null;
  connectAttempts?: number;
  connectDelayMs?: number;
  logger?: Logger;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Episode lifecycle around one office process.
 *
 * `reset`, `step` and `close` are queued and run one at a time in call order.
 */
export class CalcEnvironment implements StepRunner {
  private readonly bridge: OfficeBridge;
  private readonly dispatcher: CommandDispatcher;
  private readonly baseFile: string | null;
  private readonly goalFile: string | null;
  private readonly connectAttempts: number;
  private readonly connectDelayMs: number;
  private readonly logger: Logger;

  private session: WorkbookSession = createWorkbookSession();
  private episodeId: string = randomUUID();
  private stepCount = 0;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: CalcEnvironmentOptions) {
    this.bridge = options.bridge;
    this.dispatcher = new CommandDispatcher(options.bridge);
    this.baseFile = options.baseFile ?? null;
    this.goalFile = options.goalFile ?? null;
    this.connectAttempts = Math.max(1, options.connectAttempts ?? DEFAULT_CONNECT_ATTEMPTS);
    this.connectDelayMs = Math.max(0, options.connectDelayMs ?? DEFAULT_CONNECT_DELAY_MS);
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  state(): EnvironmentState {
    return { episode_id: this.episodeId, step_count: this.stepCount };
  }

  reset(): Promise<Observation> {
    return this.enqueue(() => this.doReset());
  }

  step(action: UnknownAction): Promise<Observation> {
    return this.enqueue(() => this.doStep(action));
  }

  close(): Promise<Observation> {
    return this.enqueue(() => this.doClose());
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // Failures reach the caller through `run`; the chain itself keeps going.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async doReset(): Promise<Observation> {
    if (this.session.connected) {
      await this.disconnectQuietly("reset");
    }

    this.episodeId = randomUUID();
    this.stepCount = 0;
    this.session = createWorkbookSession();
    const metadata = { episode_id: this.episodeId };

    try {
      await this.connectWithRetry();
      await this.bridge.newDocument();
      this.session.connected = true;
    } catch (error) {
      const code: DispatchErrorCode = isBridgeUnavailable(error) ? "bridge_unavailable" : "bridge_error";
      this.logger.error({ err: error, episodeId: this.episodeId }, "env_reset_failed");
      return failureObservation("Failed to initialize office environment", errorMessage(error), {
        reward: 0,
        metadata: { ...metadata, error_code: code }
      });
    }

    if (this.baseFile) {
      const opened = await this.dispatcher.dispatch(
        { command: "open_file", parameters: { file_path: this.baseFile } },
        this.session
      );
      if (!opened.success) {
        this.logger.warn({ baseFile: this.baseFile, error: opened.error_message }, "env_base_file_open_failed");
      }
    }

    const sheetNames = await this.dispatcher.observeSheets(this.session);
    this.logger.info({ episodeId: this.episodeId, sheets: sheetNames.length }, "env_reset");
    return successObservation("Office environment ready", {
      currentSheet: this.session.currentSheet,
      sheetNames,
      filePath: this.session.filePath,
      reward: 0,
      metadata
    });
  }

  private async doStep(action: UnknownAction): Promise<Observation> {
    this.stepCount += 1;
    const step = this.stepCount;
    const observation = await this.dispatcher.dispatch(action, this.session);

    if (!observation.success) {
      this.logger.warn(
        { step, command: action.command, errorCode: observation.metadata.error_code, error: observation.error_message },
        "env_step_failed"
      );
    }

    return withObservationFields(observation, {
      reward: observation.success ? SUCCESS_REWARD : FAILURE_REWARD,
      done: false,
      metadata: { ...observation.metadata, step, command: action.command, episode_id: this.episodeId }
    });
  }

  private async doClose(): Promise<Observation> {
    const metadata = { episode_id: this.episodeId };
    if (!this.session.connected) {
      return successObservation("Office environment closed", { done: true, metadata });
    }

    if (this.goalFile) {
      const saved = await this.dispatcher.dispatch(
        { command: "save_file", parameters: { file_path: this.goalFile } },
        this.session
      );
      if (!saved.success) {
        this.logger.warn({ goalFile: this.goalFile, error: saved.error_message }, "env_goal_file_save_failed");
      }
    }

    const filePath = this.session.filePath;
    this.session.connected = false;
    try {
      await this.bridge.disconnect();
    } catch (error) {
      this.logger.error({ err: error }, "env_close_failed");
      return failureObservation(`Error during close: ${errorMessage(error)}`, errorMessage(error), {
        filePath,
        done: true,
        metadata
      });
    }

    this.logger.info({ episodeId: this.episodeId, steps: this.stepCount }, "env_closed");
    return successObservation("Office environment closed successfully", { filePath, done: true, metadata });
  }

  private async connectWithRetry(): Promise<void> {
    for (let attempt = 1; attempt <= this.connectAttempts; attempt++) {
      try {
        await this.bridge.connect();
        return;
      } catch (error) {
        if (attempt === this.connectAttempts || !isBridgeUnavailable(error)) throw error;
        this.logger.warn({ attempt, attempts: this.connectAttempts, err: error }, "office_not_ready");
        await delay(this.connectDelayMs);
      }
    }
  }

  private async disconnectQuietly(reason: string): Promise<void> {
    this.session.connected = false;
    try {
      await this.bridge.disconnect();
    } catch (error) {
      if (!(error instanceof BridgeError)) throw error;
      this.logger.warn({ err: error, reason }, "office_disconnect_failed");
    }
  }
}
