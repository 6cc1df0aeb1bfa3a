import { RenderError } from './render.error';

const PLACEHOLDER = /\{\{\s*([a-z_][a-z0-9_]*)\s*\}\}/g;
const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

export type BindingValue = string | number;
export type Bindings = Readonly<Record<string, BindingValue>>;

export interface CommandTemplate {
  readonly name: string;
  readonly body: string;
  /** Declared placeholders in order of first appearance. */
  readonly placeholders: readonly string[];
}

export interface RenderedCommand {
  readonly template: string;
  readonly body: string;
}

export function parseTemplate(name: string, body: string): CommandTemplate {
  const placeholders: string[] = [];
  for (const match of body.matchAll(PLACEHOLDER)) {
    if (!placeholders.includes(match[1])) placeholders.push(match[1]);
  }
  return Object.freeze({ name, body, placeholders: Object.freeze(placeholders) });
}

/**
 * Quote a value for POSIX sh. Plain tokens pass through untouched so rendered
 * scripts stay readable in logs.
 */
export function shellQuote(value: string): string {
  if (SHELL_SAFE.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Checks bindings against the placeholder set and returns the text each one renders to.
 * A value starting with "-" would be read as an option by the command it lands in.
 */
export function bindValues(
  template: CommandTemplate,
  bindings: Readonly<Record<string, unknown>>,
): Map<string, string> {
  const values = new Map<string, string>();
  for (const name of template.placeholders) {
    if (!Object.prototype.hasOwnProperty.call(bindings, name)) {
      throw new RenderError('MissingBinding', name, template.name);
    }
    const value = bindings[name];
    let text: string;
    if (typeof value === 'string') {
      text = value;
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      text = String(value);
    } else {
      throw new RenderError('InvalidBinding', name, template.name);
    }
    if (text.startsWith('-')) throw new RenderError('OptionLikeBinding', name, template.name);
    values.set(name, text);
  }
  return values;
}

/**
 * Substitute every placeholder. bindings must cover the whole placeholder set;
 * keys the template does not use are ignored.
 */
export function render(
  template: CommandTemplate,
  bindings: Readonly<Record<string, unknown>>,
): RenderedCommand {
  const values = bindValues(template, bindings);
  const body = template.body.replace(PLACEHOLDER, (_token, name: string) =>
    shellQuote(values.get(name) ?? ''),
  );
  return Object.freeze({ template: template.name, body });
}
