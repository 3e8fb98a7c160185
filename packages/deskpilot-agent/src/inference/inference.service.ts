import { Injectable, Logger } from '@nestjs/common';
import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';
import {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { AgentConfigService, ModelSettings } from '../config/agent-config.service';
import { errorMessage } from '../utils/errors';
import {
  HEALTH_CHECK_TIMEOUT_MS,
  HEALTH_POLL_INTERVAL_MS,
  MAX_RETRIES,
  RETRY_BACKOFF_MS,
  SYSTEM_PROMPT,
} from './inference.constants';
import {
  InferenceErrorKind,
  ModelResponse,
  SendRequestOptions,
} from './inference.types';
import { extractJson } from './response-parser';

interface ClassifiedFailure {
  response: ModelResponse;
  retryable: boolean;
}

const failure = (
  errorKind: InferenceErrorKind,
  error: string,
  rawText = '',
): ModelResponse => ({
  rawText,
  parsedJson: null,
  success: false,
  error,
  errorKind,
});

const abortedResponse = (): ModelResponse => failure('aborted', 'Aborted');

/**
 * Talks to the vision-model server over its chat-completions endpoint.
 * The client keeps one connection pool for the life of the process; the
 * SDK's own retries are disabled in favour of the policy below.
 */
@Injectable()
export class InferenceService {
  private readonly logger = new Logger(InferenceService.name);
  private readonly openai: OpenAI;
  private readonly settings: ModelSettings;

  constructor(private readonly config: AgentConfigService) {
    this.settings = this.config.model;

    this.openai = new OpenAI({
      apiKey: 'not-needed-for-local-server',
      baseURL: `${this.settings.serverUrl}/v1`,
      timeout: this.settings.timeoutMs,
      maxRetries: 0,
    });
  }

  get serverUrl(): string {
    return this.settings.serverUrl;
  }

  async checkHealth(): Promise<boolean> {
    try {
      const response = await fetch(`${this.settings.serverUrl}/health`, {
        signal: AbortSignal.timeout(HEALTH_CHECK_TIMEOUT_MS),
      });
      return response.ok;
    } catch (error) {
      this.logger.debug(`Health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Polls /health until it answers or `maxWaitMs` runs out.
   */
  async waitForServer(maxWaitMs: number): Promise<boolean> {
    const started = Date.now();
    this.logger.log(
      `Waiting up to ${Math.round(maxWaitMs / 1000)}s for model server at ${this.settings.serverUrl}`,
    );

    while (true) {
      if (await this.checkHealth()) {
        this.logger.log(
          `Model server ready after ${((Date.now() - started) / 1000).toFixed(1)}s`,
        );
        return true;
      }
      if (Date.now() - started >= maxWaitMs) {
        this.logger.error(
          `Model server did not become healthy within ${maxWaitMs}ms`,
        );
        return false;
      }
      await this.delay(HEALTH_POLL_INTERVAL_MS);
    }
  }

  /**
   * Sends one prompt (plus an optional screenshot) and parses the reply.
   *
   * Transport failures are retried up to {@link MAX_RETRIES} times with
   * linear backoff. Malformed bodies and missing fields are returned at once.
   * Never throws.
   */
  async sendRequest(
    prompt: string,
    options: SendRequestOptions = {},
  ): Promise<ModelResponse> {
    const shouldAbort = options.shouldAbort ?? (() => false);
    const messages = this.buildMessages(prompt, options.imageBase64);
    let lastFailure: ModelResponse = failure(
      'unexpected',
      'Model request was not attempted',
    );

    for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
      if (shouldAbort()) {
        this.logger.log('Model request aborted before sending');
        return abortedResponse();
      }

      const started = Date.now();
      try {
        const completion = await this.openai.chat.completions.create(
          {
            model: this.settings.model,
            messages,
            max_tokens: options.maxTokens ?? this.settings.maxTokens,
            temperature: this.settings.temperature,
            top_p: this.settings.topP,
          },
          { signal: options.signal },
        );

        if (shouldAbort()) {
          this.logger.log('Model response discarded: task aborted');
          return abortedResponse();
        }

        this.logger.debug(`Model responded in ${Date.now() - started}ms`);
        return this.toResponse(completion);
      } catch (error) {
        const classified = this.classifyError(error);
        if (!classified.retryable) {
          return classified.response;
        }

        lastFailure = classified.response;
        if (attempt < MAX_RETRIES) {
          const backoff = RETRY_BACKOFF_MS * (attempt + 1);
          this.logger.warn(
            `${classified.response.error}; retrying in ${backoff}ms (${attempt + 1}/${MAX_RETRIES})`,
          );
          await this.delay(backoff);
        }
      }
    }

    this.logger.error(`Model request failed: ${lastFailure.error}`);
    return lastFailure;
  }

  private buildMessages(
    prompt: string,
    imageBase64?: string,
  ): ChatCompletionMessageParam[] {
    const content: ChatCompletionContentPart[] = [];
    if (imageBase64) {
      content.push({
        type: 'image_url',
        image_url: { url: `data:image/png;base64,${imageBase64}` },
      });
    }
    content.push({ type: 'text', text: prompt });

    return [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content },
    ];
  }

  private toResponse(completion: ChatCompletion): ModelResponse {
    const choices: ChatCompletion.Choice[] | undefined = completion.choices;
    const content = choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      return failure(
        'format',
        'Unexpected response format from model server: choices[0].message.content missing',
      );
    }
    return { rawText: content, parsedJson: extractJson(content), success: true };
  }

  private classifyError(error: unknown): ClassifiedFailure {
    if (error instanceof APIUserAbortError) {
      return { response: abortedResponse(), retryable: false };
    }
    if (error instanceof APIConnectionTimeoutError) {
      return {
        response: failure(
          'timeout',
          `Model request timed out after ${Math.round(this.settings.timeoutMs / 1000)}s`,
        ),
        retryable: true,
      };
    }
    if (error instanceof APIConnectionError) {
      return {
        response: failure(
          'connection',
          `Cannot connect to model server at ${this.settings.serverUrl}`,
        ),
        retryable: true,
      };
    }
    if (error instanceof APIError) {
      return {
        response: failure(
          'http',
          `API error ${error.status ?? 'unknown'}: ${error.message}`,
        ),
        retryable: true,
      };
    }
    if (error instanceof SyntaxError) {
      return {
        response: failure(
          'decode',
          `Invalid response from model server (not valid JSON): ${error.message}`,
        ),
        retryable: false,
      };
    }
    return {
      response: failure(
        'unexpected',
        `Unexpected error calling model server: ${errorMessage(error)}`,
      ),
      retryable: true,
    };
  }

  private async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
