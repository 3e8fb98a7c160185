/**
 * A structurally invalid action: missing coordinates, missing payload,
 * an unknown key.
 */
export class ActionError extends Error {
  constructor(
    message: string,
    readonly kind?: string,
  ) {
    super(message);
    this.name = 'ActionError';
  }
}

/**
 * The model's action JSON could not be turned into an intent.
 */
export class ActionDecodeError extends ActionError {
  constructor(message: string, kind?: string) {
    super(message, kind);
    this.name = 'ActionDecodeError';
  }
}

/**
 * The operator pulled the pointer into a screen corner.
 */
export class FailsafeTriggeredError extends Error {
  constructor() {
    super('Failsafe triggered: pointer moved to a screen corner');
    this.name = 'FailsafeTriggeredError';
  }
}
