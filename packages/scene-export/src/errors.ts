// ---------------------------------------------------------------------------
// Export errors
// ---------------------------------------------------------------------------

/** Field name -> validation messages, as produced by zod's flatten(). */
export type OptionFieldErrors = Partial<Record<string, string[]>>;

/** Export options failed schema validation. */
export class ExportOptionsError extends Error {
  constructor(public readonly fields: OptionFieldErrors) {
    const detail = Object.entries(fields)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    super(`Invalid export options: ${detail}`);
    this.name = 'ExportOptionsError';
  }
}

/** The scene cannot be exported as given. */
export class ExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExportError';
  }
}
