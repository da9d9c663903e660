/**
 * Path template matching.
 *
 * A template such as `/redfish/v1/Chassis/{ChassisId}` is compiled into an
 * anchored regular expression where every `{Name}` placeholder matches one
 * non-empty path segment. Everything else in the template matches literally,
 * including a brace group such as `{Foo_Id}` whose content is not a valid
 * placeholder name.
 */
import { MalformedTemplateError } from '../../utils/errors.js';

/** Placeholder names are one or more ASCII letters or digits. */
const PLACEHOLDER_NAME = /^[A-Za-z0-9]+$/;

/** One or more characters, never a path separator. */
const SEGMENT_WILDCARD = '[^/]+';

/**
 * A template compiled into a matcher.
 */
export interface CompiledTemplate {
  /** Template text as declared in the OpenAPI document */
  template: string;
  /** Placeholder names in order of appearance */
  placeholders: string[];
  /** Anchored pattern */
  pattern: RegExp;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a path template.
 * @throws MalformedTemplateError on unbalanced or nested braces
 */
export function compileTemplate(template: string): CompiledTemplate {
  const placeholders: string[] = [];
  let source = '^';
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf('{', cursor);
    const close = template.indexOf('}', cursor);

    if (close !== -1 && (open === -1 || close < open)) {
      throw new MalformedTemplateError(template, `unexpected '}' at position ${close}`);
    }
    if (open === -1) {
      source += escapeRegExp(template.slice(cursor));
      break;
    }
    if (close === -1) {
      throw new MalformedTemplateError(template, `unclosed '{' at position ${open}`);
    }

    const name = template.slice(open + 1, close);
    if (name.includes('{')) {
      throw new MalformedTemplateError(template, `nested '{' at position ${open + 1 + name.indexOf('{')}`);
    }
    if (!PLACEHOLDER_NAME.test(name)) {
      source += escapeRegExp(template.slice(cursor, close + 1));
      cursor = close + 1;
      continue;
    }

    source += escapeRegExp(template.slice(cursor, open)) + SEGMENT_WILDCARD;
    placeholders.push(name);
    cursor = close + 1;
  }

  return { template, placeholders, pattern: new RegExp(`${source}$`) };
}

/**
 * Check whether an identifier matches a single template.
 */
export function matches(identifier: string, template: string | CompiledTemplate): boolean {
  const compiled = typeof template === 'string' ? compileTemplate(template) : template;
  return compiled.pattern.test(identifier);
}

/**
 * The set of path templates declared by an OpenAPI document.
 *
 * Templates are compiled when the set is built, so a malformed template fails
 * before any resource is checked. Iteration follows lexicographic template order.
 */
export class PathSet implements Iterable<CompiledTemplate> {
  private readonly compiled: readonly CompiledTemplate[];

  private constructor(compiled: readonly CompiledTemplate[]) {
    this.compiled = compiled;
  }

  static fromTemplates(templates: Iterable<string>): PathSet {
    const unique = [...new Set(templates)].sort();
    return new PathSet(unique.map(compileTemplate));
  }

  static empty(): PathSet {
    return new PathSet([]);
  }

  get size(): number {
    return this.compiled.length;
  }

  /** Template strings in iteration order. */
  templates(): string[] {
    return this.compiled.map((c) => c.template);
  }

  /** First template matching the identifier, if any. */
  find(identifier: string): CompiledTemplate | undefined {
    return this.compiled.find((c) => c.pattern.test(identifier));
  }

  [Symbol.iterator](): Iterator<CompiledTemplate> {
    return this.compiled[Symbol.iterator]();
  }
}

/**
 * Check whether an identifier matches any template in the set.
 * Stops at the first match.
 */
export function matchesAny(identifier: string, pathSet: PathSet): boolean {
  return pathSet.find(identifier) !== undefined;
}
