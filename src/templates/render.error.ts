export type RenderFailure = 'MissingBinding' | 'InvalidBinding' | 'OptionLikeBinding' | 'UnknownTemplate';

/**
 * A deployment is misconfigured: a template cannot be turned into a command.
 * Never retried; raised before anything is sent to a target.
 */
export class RenderError extends Error {
  override readonly name = 'RenderError';

  constructor(
    readonly kind: RenderFailure,
    /** Binding name, or the template name for UnknownTemplate. */
    readonly subject: string,
    readonly template: string,
  ) {
    super(RenderError.describe(kind, subject, template));
  }

  private static describe(kind: RenderFailure, subject: string, template: string): string {
    switch (kind) {
      case 'MissingBinding':
        return `Template "${template}" requires binding "${subject}"`;
      case 'InvalidBinding':
        return `Binding "${subject}" for template "${template}" must be a string or a finite number`;
      case 'OptionLikeBinding':
        return `Binding "${subject}" for template "${template}" must not start with "-"`;
      case 'UnknownTemplate':
        return `Unknown command template "${subject}"`;
    }
  }
}
