import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export const CONFIG_DEFAULTS = {
  DESKPILOT_MODEL_SERVER_URL: 'http://127.0.0.1:8080',
  DESKPILOT_MODEL_NAME: 'qwen3-vl',
  DESKPILOT_MODEL_TIMEOUT_MS: 60_000,
  DESKPILOT_MODEL_MAX_TOKENS: 1024,
  DESKPILOT_MODEL_TEMPERATURE: 0.7,
  DESKPILOT_MODEL_TOP_P: 0.8,
  DESKPILOT_SERVER_WAIT_MS: 60_000,
  DESKPILOT_MAX_ITERATIONS: 25,
  DESKPILOT_CONFIDENCE_THRESHOLD: 0.8,
  DESKPILOT_ACTION_DELAY_MS: 0,
  DESKPILOT_PAUSE_BEFORE_ACTION_MS: 0,
  DESKPILOT_FAILSAFE: true,
  DESKPILOT_STABILITY_ENABLED: true,
  DESKPILOT_STABILITY_THRESHOLD: 0.02,
  DESKPILOT_STABILITY_MAX_WAIT_MS: 3000,
  DESKPILOT_STABILITY_INTERVAL_MS: 150,
  DESKPILOT_STABILITY_MIN_FRAMES: 2,
  DESKPILOT_UI_SETTLE_MS: 1500,
  DESKPILOT_MAX_IMAGE_SIZE: 1080,
  DESKPILOT_IDLE_DELAY_MS: 3000,
  DESKPILOT_PORT: 9991,
} as const;

type ConfigKey = keyof typeof CONFIG_DEFAULTS;
type NumericKey = {
  [K in ConfigKey]: (typeof CONFIG_DEFAULTS)[K] extends number ? K : never;
}[ConfigKey];
type BooleanKey = {
  [K in ConfigKey]: (typeof CONFIG_DEFAULTS)[K] extends boolean ? K : never;
}[ConfigKey];

type NumberBounds = { min?: number; max?: number; integer?: boolean };

export interface ExecutorSettings {
  confidenceThreshold: number;
  postActionDelayMs: number;
  preActionPauseMs: number;
  failsafe: boolean;
}

export interface StabilitySettings {
  enabled: boolean;
  threshold: number;
  maxWaitMs: number;
  checkIntervalMs: number;
  minStableFrames: number;
  settleDelayMs: number;
}

export interface ModelSettings {
  serverUrl: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
  topP: number;
}

/**
 * Typed view over environment configuration. Values that fail to parse
 * fall back to their default with a warning.
 */
@Injectable()
export class AgentConfigService {
  private readonly logger = new Logger(AgentConfigService.name);

  constructor(private readonly configService: ConfigService) {}

  get model(): ModelSettings {
    return {
      serverUrl: this.getString('DESKPILOT_MODEL_SERVER_URL').replace(
        /\/+$/,
        '',
      ),
      model: this.getString('DESKPILOT_MODEL_NAME'),
      timeoutMs: this.getNumber('DESKPILOT_MODEL_TIMEOUT_MS', {
        min: 1,
        integer: true,
      }),
      maxTokens: this.getNumber('DESKPILOT_MODEL_MAX_TOKENS', {
        min: 1,
        integer: true,
      }),
      temperature: this.getNumber('DESKPILOT_MODEL_TEMPERATURE', {
        min: 0,
        max: 2,
      }),
      topP: this.getNumber('DESKPILOT_MODEL_TOP_P', { min: 0, max: 1 }),
    };
  }

  get executor(): ExecutorSettings {
    return {
      confidenceThreshold: this.getNumber('DESKPILOT_CONFIDENCE_THRESHOLD', {
        min: 0,
        max: 1,
      }),
      postActionDelayMs: this.getNumber('DESKPILOT_ACTION_DELAY_MS', {
        min: 0,
      }),
      preActionPauseMs: this.getNumber('DESKPILOT_PAUSE_BEFORE_ACTION_MS', {
        min: 0,
      }),
      failsafe: this.getBoolean('DESKPILOT_FAILSAFE'),
    };
  }

  get stability(): StabilitySettings {
    return {
      enabled: this.getBoolean('DESKPILOT_STABILITY_ENABLED'),
      threshold: this.getNumber('DESKPILOT_STABILITY_THRESHOLD', {
        min: 0,
        max: 1,
      }),
      maxWaitMs: this.getNumber('DESKPILOT_STABILITY_MAX_WAIT_MS', { min: 0 }),
      checkIntervalMs: this.getNumber('DESKPILOT_STABILITY_INTERVAL_MS', {
        min: 1,
      }),
      minStableFrames: this.getNumber('DESKPILOT_STABILITY_MIN_FRAMES', {
        min: 1,
        integer: true,
      }),
      settleDelayMs: this.getNumber('DESKPILOT_UI_SETTLE_MS', { min: 0 }),
    };
  }

  get maxIterations(): number {
    return this.getNumber('DESKPILOT_MAX_ITERATIONS', {
      min: 1,
      integer: true,
    });
  }

  get serverWaitMs(): number {
    return this.getNumber('DESKPILOT_SERVER_WAIT_MS', { min: 0 });
  }

  get maxImageSize(): number {
    return this.getNumber('DESKPILOT_MAX_IMAGE_SIZE', {
      min: 64,
      integer: true,
    });
  }

  get idleDelayMs(): number {
    return this.getNumber('DESKPILOT_IDLE_DELAY_MS', { min: 0 });
  }

  get port(): number {
    return this.getNumber('DESKPILOT_PORT', {
      min: 1,
      max: 65535,
      integer: true,
    });
  }

  private getString(key: ConfigKey): string {
    const raw = this.configService.get<string>(key);
    if (raw === undefined || raw.trim().length === 0) {
      return String(CONFIG_DEFAULTS[key]);
    }
    return raw.trim();
  }

  private getNumber(key: NumericKey, bounds: NumberBounds = {}): number {
    const fallback = CONFIG_DEFAULTS[key];
    const raw = this.configService.get<string>(key);
    if (raw === undefined || raw.trim().length === 0) {
      return fallback;
    }

    const value = Number(raw);
    const invalid =
      !Number.isFinite(value) ||
      (bounds.integer === true && !Number.isInteger(value)) ||
      (bounds.min !== undefined && value < bounds.min) ||
      (bounds.max !== undefined && value > bounds.max);

    if (invalid) {
      this.logger.warn(
        `Ignoring ${key}="${raw}" (expected ${this.describeBounds(bounds)}); using ${fallback}`,
      );
      return fallback;
    }
    return value;
  }

  private getBoolean(key: BooleanKey): boolean {
    const fallback = CONFIG_DEFAULTS[key];
    const raw = this.configService.get<string>(key);
    if (raw === undefined || raw.trim().length === 0) {
      return fallback;
    }

    const normalized = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    if (['0', 'false', 'no', 'off'].includes(normalized)) {
      return false;
    }

    this.logger.warn(`Ignoring ${key}="${raw}"; using ${fallback}`);
    return fallback;
  }

  private describeBounds(bounds: NumberBounds): string {
    const parts = [bounds.integer ? 'an integer' : 'a number'];
    if (bounds.min !== undefined) {
      parts.push(`>= ${bounds.min}`);
    }
    if (bounds.max !== undefined) {
      parts.push(`<= ${bounds.max}`);
    }
    return parts.join(' ');
  }
}
