import { Injectable, Logger } from '@nestjs/common';
import { ActionRecord } from '@deskpilot/shared';
import { recoveryPrompt } from './agent.constants';

export interface ActionSignature {
  kind: string;
  /** 'unknown' when the model named no target. */
  target: string;
}

/**
 * Loop detection result
 */
export interface LoopDetectionResult {
  isLoop: boolean;
  /** Attempts including the one about to run. */
  loopCount?: number;
  pattern?: string;
  suggestion?: string;
}

/**
 * Spots the model repeating the same action kind on the same target.
 * Only the unbroken run at the end of the history counts; a detection
 * steers the next prompt and never blocks execution.
 */
@Injectable()
export class LoopDetectionService {
  private readonly logger = new Logger(LoopDetectionService.name);

  detectRepeat(
    history: readonly ActionRecord[],
    candidate: ActionSignature,
  ): LoopDetectionResult {
    let run = 0;
    for (let i = history.length - 1; i >= 0; i--) {
      const previous = history[i];
      if (
        previous.kind !== candidate.kind ||
        previous.target !== candidate.target
      ) {
        break;
      }
      run++;
    }

    if (run === 0) {
      return { isLoop: false };
    }

    const loopCount = run + 1;
    const pattern = `${candidate.kind} on ${candidate.target}`;
    this.logger.warn(
      `Detected repeating '${candidate.kind}' on '${candidate.target}' (${loopCount} times), forcing a strategy change`,
    );

    return {
      isLoop: true,
      loopCount,
      pattern,
      suggestion: recoveryPrompt(pattern, loopCount),
    };
  }
}
