// --------------------------------------------------------------------------
// Error types
// --------------------------------------------------------------------------

export type FormPilotErrorCode =
  | 'question_not_found'
  | 'input_field_not_found'
  | 'no_options_found'
  | 'click_intercepted'
  | 'navigation_timeout'
  | 'driver_launch_failed'
  | 'driver_not_started'
  | 'invalid_batch_options'
  | 'invalid_survey_definition';

export class FormPilotError extends Error {
  constructor(
    message: string,
    public readonly code: FormPilotErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'FormPilotError';
  }
}

export class QuestionNotFoundError extends FormPilotError {
  constructor(public readonly label: string) {
    super(`Could not find question with text: ${label}`, 'question_not_found');
    this.name = 'QuestionNotFoundError';
  }
}

export class InputFieldNotFoundError extends FormPilotError {
  constructor(
    public readonly label: string,
    expected: string,
  ) {
    super(`Could not find ${expected} for question '${label}'`, 'input_field_not_found');
    this.name = 'InputFieldNotFoundError';
  }
}

export class NoOptionsFoundError extends FormPilotError {
  constructor(
    public readonly label: string,
    public readonly preferredOption?: string,
  ) {
    super(
      preferredOption === undefined
        ? `No radio options found for question '${label}'`
        : `No radio option '${preferredOption}' found for question '${label}'`,
      'no_options_found',
    );
    this.name = 'NoOptionsFoundError';
  }
}

/**
 * Another element received the pointer event (tooltip, ripple animation,
 * sticky header). Retried once through a script-dispatched click.
 */
export class ClickInterceptedError extends FormPilotError {
  constructor(message: string, details?: unknown) {
    super(message, 'click_intercepted', details);
    this.name = 'ClickInterceptedError';
  }
}

export class NavigationTimeoutError extends FormPilotError {
  constructor(
    public readonly target: string,
    public readonly timeoutMs: number,
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for ${target}`, 'navigation_timeout');
    this.name = 'NavigationTimeoutError';
  }
}

export class DriverLaunchError extends FormPilotError {
  constructor(cause: unknown) {
    super(`Failed to launch browser driver: ${errorMessage(cause)}`, 'driver_launch_failed', cause);
    this.name = 'DriverLaunchError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
