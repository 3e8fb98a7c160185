export type InferenceErrorKind =
  | 'aborted'
  | 'timeout'
  | 'connection'
  | 'http'
  | 'decode'
  | 'format'
  | 'unexpected';

export type ParsedPlan = Record<string, unknown>;

export interface ModelResponse {
  rawText: string;
  /** Null when the text held no usable JSON object. */
  parsedJson: ParsedPlan | null;
  success: boolean;
  error?: string;
  errorKind?: InferenceErrorKind;
}

export interface SendRequestOptions {
  /** Base64 PNG, inlined as a data URI. */
  imageBase64?: string;
  maxTokens?: number;
  /** Consulted before each attempt and after each response. */
  shouldAbort?: () => boolean;
  signal?: AbortSignal;
}
