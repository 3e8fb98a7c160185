import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  ActionIntent,
  CalibrationOffset,
  TaskResult,
  applyOffset,
  intentPoints,
  mapIntentPoints,
  toPixels,
} from '@deskpilot/shared';
import { AgentConfigService } from '../config/agent-config.service';
import { ActionExecutor } from '../actions/action-executor';
import { formatActionRecord } from '../actions/action-history';
import { decodeAction } from '../actions/action-decoder';
import { FailsafeTriggeredError } from '../actions/action.errors';
import {
  SCREEN_CAPTURE,
  ScreenCapture,
  WINDOW_CONTEXT,
  WindowContextProvider,
} from '../actions/input.capability';
import { AgentEventsService } from '../events/agent-events.service';
import { EncodedFrame, encodeFramePng } from '../frames/frame.utils';
import { InferenceService } from '../inference/inference.service';
import { extractTaggedSection } from '../inference/response-parser';
import { StabilityService } from '../stability/stability.service';
import { errorMessage, errorStack } from '../utils/errors';
import {
  CALIBRATION_OFFSET,
  HISTORY_TRACE_LENGTH,
  INVALID_PLAN_ERROR,
  PAUSE_POLL_MS,
  buildPlanPrompt,
} from './agent.constants';
import { AgentBusyError, AgentState, StepOutcome } from './agent.types';
import { LoopDetectionService } from './loop-detection.service';

const CONTINUE: StepOutcome = { kind: 'continue' };

/**
 * Runs one task at a time as a bounded capture → plan → act → settle loop.
 *
 * Interrupts (abort, pause, skip, steering) only flip flags or append to
 * the steering list; the loop observes them at the top of each iteration
 * and inside the pause wait.
 */
@Injectable()
export class AgentProcessor implements OnModuleDestroy {
  private readonly logger = new Logger(AgentProcessor.name);
  private isProcessing = false;
  private currentTask: string | null = null;
  private abortController: AbortController | null = null;
  private idleTimer: NodeJS.Timeout | null = null;

  private aborted = false;
  private paused = false;
  private skipRequested = false;
  private readonly steering: string[] = [];
  private lastError: string | null = null;

  constructor(
    private readonly inference: InferenceService,
    private readonly executor: ActionExecutor,
    private readonly stability: StabilityService,
    private readonly loopDetection: LoopDetectionService,
    private readonly events: AgentEventsService,
    private readonly config: AgentConfigService,
    @Inject(SCREEN_CAPTURE) private readonly screen: ScreenCapture,
    @Inject(WINDOW_CONTEXT) private readonly windows: WindowContextProvider,
    @Inject(CALIBRATION_OFFSET) private readonly offset: CalibrationOffset,
  ) {}

  /**
   * Check if the processor is currently processing a task
   */
  isRunning(): boolean {
    return this.isProcessing;
  }

  getState(): AgentState {
    const { status, detail } = this.events.status;
    return {
      status,
      detail,
      currentTask: this.currentTask,
      paused: this.paused,
    };
  }

  abort(): boolean {
    if (!this.isProcessing) {
      return false;
    }
    this.logger.log(`Abort requested for task: ${this.currentTask}`);
    this.aborted = true;
    this.abortController?.abort();
    return true;
  }

  pause(): boolean {
    if (!this.isProcessing || this.paused) {
      return false;
    }
    this.paused = true;
    this.logger.log('Paused');
    this.events.emitStatus('PAUSED', 'Paused');
    return true;
  }

  resume(): boolean {
    if (!this.paused) {
      return false;
    }
    this.paused = false;
    this.logger.log('Resumed');
    this.events.emitStatus('RUNNING', `Task: ${this.currentTask ?? ''}`);
    return true;
  }

  skipStep(): boolean {
    if (!this.isProcessing) {
      return false;
    }
    this.skipRequested = true;
    return true;
  }

  /**
   * Queues steering text for the next prompt. Text sent while idle is
   * delivered to the next task.
   */
  injectContext(text: string): void {
    this.steering.push(text);
    this.logger.log(`Context injected: ${text}`);
    this.events.emitThought(`Heard: ${text.slice(0, 50)}...`);
  }

  /**
   * Runs `task` to completion, abort or the iteration budget. Never
   * rejects except with {@link AgentBusyError} when a task is running.
   */
  async executeTask(task: string): Promise<TaskResult> {
    if (this.isProcessing) {
      throw new AgentBusyError(this.currentTask);
    }

    this.logger.log(`Starting task: ${task}`);
    this.isProcessing = true;
    this.currentTask = task;
    this.abortController = new AbortController();
    this.aborted = false;
    this.paused = false;
    this.skipRequested = false;
    this.lastError = null;
    this.executor.history.clear();
    this.clearIdleTimer();

    const startedAt = Date.now();
    this.events.emitStatus('RUNNING', `Task: ${task}`);

    try {
      return await this.runLoop(task, startedAt);
    } catch (error) {
      this.logger.error(
        `Task failed unexpectedly: ${errorMessage(error)}`,
        errorStack(error),
      );
      this.events.emitStatus('ERROR', errorMessage(error));
      return {
        success: false,
        message: 'Task failed',
        stepsTaken: 0,
        durationSeconds: this.secondsSince(startedAt),
        error: errorMessage(error),
      };
    } finally {
      this.finish();
    }
  }

  onModuleDestroy(): void {
    this.abort();
    this.clearIdleTimer();
  }

  private async runLoop(task: string, startedAt: number): Promise<TaskResult> {
    const maxIterations = this.config.maxIterations;

    for (let i = 0; i < maxIterations; i++) {
      if (this.aborted) {
        return this.abortedResult(i, startedAt, 'Aborted');
      }

      await this.waitWhilePaused();
      if (this.aborted) {
        return this.abortedResult(i, startedAt, 'Aborted');
      }

      if (this.skipRequested) {
        this.skipRequested = false;
        this.logger.log(`Skipping step ${i + 1}`);
        continue;
      }

      const step = i + 1;
      let outcome: StepOutcome;
      try {
        outcome = await this.runStep(task, step, maxIterations);
      } catch (error) {
        this.logger.error(
          `Step ${step} failed: ${errorMessage(error)}`,
          errorStack(error),
        );
        this.lastError = errorMessage(error);
        continue;
      }

      if (outcome.kind === 'done') {
        this.events.emitStatus('DONE', 'Task complete');
        this.events.emitThought('Done.');
        const durationSeconds = this.secondsSince(startedAt);
        this.logger.log(
          `Task complete after ${step} steps in ${durationSeconds.toFixed(1)}s`,
        );
        return {
          success: true,
          message: 'Complete',
          stepsTaken: step,
          durationSeconds,
        };
      }
      if (outcome.kind === 'aborted') {
        return this.abortedResult(i, startedAt, outcome.error);
      }
    }

    this.logger.warn(`Max steps reached (${maxIterations})`);
    this.events.emitStatus('ERROR', 'Max steps reached');
    this.events.emitThought('Stopped: max steps reached.');
    return {
      success: false,
      message: 'Max steps reached',
      stepsTaken: maxIterations,
      durationSeconds: this.secondsSince(startedAt),
      error: 'Max steps reached',
    };
  }

  private async runStep(
    task: string,
    step: number,
    maxIterations: number,
  ): Promise<StepOutcome> {
    this.logger.log(`Step ${step}/${maxIterations}`);

    const captureStarted = Date.now();
    const frame = await this.screen.capture();
    const encoded = await encodeFramePng(frame, this.config.maxImageSize);
    this.logger.debug(
      `Captured ${frame.width}x${frame.height} (sent as ${encoded.width}x${encoded.height}) in ${Date.now() - captureStarted}ms`,
    );
    this.events.emitFrame(encoded.base64, encoded.width, encoded.height);

    const prompt = buildPlanPrompt(
      task,
      await this.buildContext(encoded, step, maxIterations),
      this.buildHistoryTrace(),
    );

    const requestStarted = Date.now();
    const response = await this.inference.sendRequest(prompt, {
      imageBase64: encoded.base64,
      shouldAbort: () => this.aborted,
      signal: this.abortController?.signal,
    });

    if (!response.success) {
      if (response.errorKind === 'aborted' || this.aborted) {
        return { kind: 'aborted', error: 'Aborted' };
      }
      this.logger.error(`Model request failed: ${response.error}`);
      this.lastError = response.error ?? 'Model request failed';
      return CONTINUE;
    }
    this.logger.debug(`Model responded in ${Date.now() - requestStarted}ms`);

    this.emitThoughts(response.rawText);

    const plan = response.parsedJson;
    if (!plan) {
      this.logger.error('Invalid JSON from model; skipping this step');
      this.logger.debug(`Raw response: ${response.rawText.slice(0, 500)}`);
      this.lastError = INVALID_PLAN_ERROR;
      return CONTINUE;
    }

    if (typeof plan.thought === 'string') {
      this.logger.log(`Plan: ${plan.thought}`);
    }
    if (plan.task_complete === true) {
      return { kind: 'done' };
    }

    const failsafe = await this.act(plan, response.rawText);
    if (failsafe) {
      return { kind: 'aborted', error: failsafe.message };
    }

    await this.settle();
    return CONTINUE;
  }

  /**
   * Decodes, resolves and executes one action. Returns the failsafe error
   * when the operator stopped the run; every other failure is carried into
   * the next prompt.
   */
  private async act(
    plan: Record<string, unknown>,
    rawText: string,
  ): Promise<FailsafeTriggeredError | null> {
    let intent: ActionIntent;
    try {
      intent = this.resolveCoordinates(
        decodeAction(plan, { fallbackText: rawText }),
      );
    } catch (error) {
      this.logger.error(`Action rejected: ${errorMessage(error)}`);
      this.lastError = errorMessage(error);
      return null;
    }

    const target = intent.target ?? 'unknown';
    const repeat = this.loopDetection.detectRepeat(
      this.executor.history.entries(),
      { kind: intent.kind, target },
    );
    const nudge = repeat.suggestion ?? null;

    this.events.emitAction(intent.kind, target);

    try {
      await this.executor.execute(intent);
      // A successful repeat still carries the recovery directive forward.
      this.lastError = nudge;
    } catch (error) {
      if (error instanceof FailsafeTriggeredError) {
        this.logger.error(error.message);
        return error;
      }
      this.logger.error(`Action failed: ${errorMessage(error)}`);
      this.lastError = nudge
        ? `${errorMessage(error)}\n${nudge}`
        : errorMessage(error);
    }
    return null;
  }

  /**
   * Normalized model coordinates to screen pixels plus the calibration
   * offset.
   */
  private resolveCoordinates(intent: ActionIntent): ActionIntent {
    const { width, height } = this.executor.screen;
    const resolved = mapIntentPoints(intent, (point) =>
      applyOffset(toPixels(point.x, point.y, width, height), this.offset),
    );

    const before = intentPoints(intent);
    intentPoints(resolved).forEach((pixel, index) => {
      const normalized = before[index];
      this.logger.debug(
        `Coordinates (${normalized.x}, ${normalized.y}) -> (${pixel.x}, ${pixel.y}) on ${width}x${height}, offset (${this.offset.dx}, ${this.offset.dy})`,
      );
    });
    return resolved;
  }

  private async buildContext(
    encoded: EncodedFrame,
    step: number,
    maxIterations: number,
  ): Promise<string> {
    const lines = [
      `Screen: ${encoded.width}x${encoded.height}`,
      `Step: ${step}/${maxIterations}`,
    ];

    try {
      lines.push(await this.windows.describeWindows());
    } catch (error) {
      this.logger.debug(`Could not get window context: ${errorMessage(error)}`);
    }

    if (this.lastError) {
      lines.push(`Previous issue: ${this.lastError}`);
    }

    for (const text of this.steering.splice(0)) {
      lines.push(`User: ${text}`);
    }

    return lines.join('\n');
  }

  private buildHistoryTrace(): string {
    return this.executor.history
      .recent(HISTORY_TRACE_LENGTH)
      .map((record) => `- ${formatActionRecord(record)}`)
      .join('\n');
  }

  private emitThoughts(rawText: string): void {
    const observation = extractTaggedSection(rawText, 'observation');
    const reasoning = extractTaggedSection(rawText, 'reasoning');

    let display = '';
    if (observation) {
      this.logger.log(`Observation:\n${observation}`);
      display = `${observation.slice(0, 150)}...`;
    }
    if (reasoning) {
      this.logger.log(`Reasoning:\n${reasoning}`);
      display = display
        ? `${display}\n${reasoning.slice(0, 100)}`
        : `${reasoning.slice(0, 200)}...`;
    }
    if (display) {
      this.events.emitThought(display);
    }
  }

  private async settle(): Promise<void> {
    const { enabled, settleDelayMs } = this.config.stability;
    if (!enabled) {
      await this.sleep(settleDelayMs);
      return;
    }

    const started = Date.now();
    const { ready, reason } = await this.stability.ready();
    if (ready) {
      this.logger.debug(`Screen ready in ${Date.now() - started}ms: ${reason}`);
    } else {
      this.logger.warn(`Screen stability: ${reason}`);
    }
  }

  private async waitWhilePaused(): Promise<void> {
    while (this.paused && !this.aborted) {
      await this.sleep(PAUSE_POLL_MS);
    }
  }

  private abortedResult(
    step: number,
    startedAt: number,
    error: string,
  ): TaskResult {
    this.logger.warn(`Task aborted at step ${step}: ${error}`);
    this.events.emitStatus('ABORTED', 'Task aborted');
    this.events.emitThought('Aborted.');
    return {
      success: false,
      message: 'Aborted',
      stepsTaken: step,
      durationSeconds: this.secondsSince(startedAt),
      error,
    };
  }

  private finish(): void {
    this.aborted = false;
    this.paused = false;
    this.skipRequested = false;
    this.isProcessing = false;
    this.currentTask = null;
    this.abortController = null;
    this.scheduleIdle();
  }

  /**
   * Lets the terminal status show briefly before reporting idle.
   */
  private scheduleIdle(): void {
    this.clearIdleTimer();
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      this.events.emitStatus('IDLE');
    }, this.config.idleDelayMs);
    this.idleTimer.unref();
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private secondsSince(startedAt: number): number {
    return (Date.now() - startedAt) / 1000;
  }

  private async sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
