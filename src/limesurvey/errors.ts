// Every failure raised while talking to RemoteControl extends LimeSurveyError,
// so tool handlers can tell upstream problems apart from programming errors.
export class LimeSurveyError extends Error {
  readonly method: string;

  constructor(method: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LimeSurveyError";
    this.method = method;
  }
}

export class LimeSurveyHttpError extends LimeSurveyError {
  /** HTTP status, or 0 when no response was received. */
  readonly status: number;

  constructor(method: string, status: number, message: string, options?: { cause?: unknown }) {
    super(method, message, options);
    this.name = "LimeSurveyHttpError";
    this.status = status;
  }
}

export class LimeSurveyRpcError extends LimeSurveyError {
  constructor(method: string, message: string) {
    super(method, `${method}: ${message}`);
    this.name = "LimeSurveyRpcError";
  }
}

export class LimeSurveyStatusError extends LimeSurveyError {
  readonly status: string;

  constructor(method: string, status: string) {
    super(method, `${method}: ${status}`);
    this.name = "LimeSurveyStatusError";
    this.status = status;
  }
}

export class LimeSurveyAuthError extends LimeSurveyStatusError {
  constructor(status: string) {
    super("get_session_key", status);
    this.name = "LimeSurveyAuthError";
  }
}

export class LimeSurveyResponseError extends LimeSurveyError {
  constructor(method: string, message: string, options?: { cause?: unknown }) {
    super(method, `${method}: unexpected response (${message})`, options);
    this.name = "LimeSurveyResponseError";
  }
}
