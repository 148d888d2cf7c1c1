export type ErrorClassification = 'contract' | 'lookup' | 'configuration';

/** 所有 tokenpath domain 錯誤的基底類別 */
export abstract class TokenPathError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Contract ---

/** format 時缺少必要 token（非 default=） */
export class MissingTokensError extends TokenPathError {
  readonly classification = 'contract' as const;
  readonly code = 'MISSING_TOKENS';

  constructor(
    public readonly templateName: string,
    public readonly missingTokens: readonly string[],
    options?: ErrorOptions,
  ) {
    const label = templateName ? ` for template "${templateName}"` : '';
    super(`Missing required tokens${label}: ${missingTokens.join(', ')}`, options);
  }
}

export class UnknownStopTokenError extends TokenPathError {
  readonly classification = 'contract' as const;
  readonly code = 'UNKNOWN_STOP_TOKEN';

  constructor(
    public readonly stopToken: string,
    public readonly availableTokens: readonly string[],
    options?: ErrorOptions,
  ) {
    super(
      `stopAtToken "${stopToken}" not found in template. Available tokens: ${availableTokens.join(', ')}`,
      options,
    );
  }
}

// --- Lookup ---

export class TemplateNotFoundError extends TokenPathError {
  readonly classification = 'lookup' as const;
  readonly code = 'TEMPLATE_NOT_FOUND';

  constructor(public readonly templateName: string, options?: ErrorOptions) {
    super(`Template "${templateName}" not registered`, options);
  }
}

export class BaseNotFoundError extends TokenPathError {
  readonly classification = 'lookup' as const;
  readonly code = 'BASE_NOT_FOUND';

  constructor(public readonly baseName: string, options?: ErrorOptions) {
    super(`Base template "${baseName}" not found`, options);
  }
}

export class UnregisteredContextShapeError extends TokenPathError {
  readonly classification = 'lookup' as const;
  readonly code = 'UNREGISTERED_SHAPE';

  constructor(public readonly shapeName: string, options?: ErrorOptions) {
    super(`Context shape "${shapeName}" is not registered`, options);
  }
}

// --- Configuration ---

/** 批次 template 定義格式錯誤 */
export class DefinitionLoadError extends TokenPathError {
  readonly classification = 'configuration' as const;
  readonly code = 'DEFINITION_INVALID';

  constructor(
    message: string,
    public readonly issues: readonly string[],
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class ConfigValidationError extends TokenPathError {
  readonly classification = 'configuration' as const;
  readonly code = 'CONFIG_INVALID';
}
