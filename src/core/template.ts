/**
 * Template Substitution
 *
 * Markers, resolved in this order:
 * - {?flag: text}      text kept (with a leading space) only when flag is truthy
 * - {primary|fallback} first truthy of the two
 * - {name}             plain substitution
 */

import { TemplateError } from './errors.js';
import type { TemplateVariables } from './types.js';

const CONDITIONAL_OPEN = '{?';
const CONDITIONAL_HEADER = /^\{\?(\w+):\s*/;
const FALLBACK_PATTERN = /\{(\w+)\|(\w+)\}/g;
const SIMPLE_PATTERN = /\{(\w+)\}/g;
const CONDITION_NAME_PATTERN = /\{\?(\w+):/g;

/**
 * Falsy: undefined, null, false, 0, NaN, '', [] and {}
 */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Date) return true;
  if (typeof value === 'object' && value !== null) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}

function hasVariable(variables: TemplateVariables, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(variables, name) && variables[name] !== undefined;
}

/**
 * Index of the brace closing the one at `start`, or -1
 */
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    if (text[i] === '{') {
      depth++;
    } else if (text[i] === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function render(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export class TemplateSubstitution {
  /**
   * Substitute every marker in the template
   */
  static substitute(template: string, variables: TemplateVariables): string {
    if (!TemplateSubstitution.validateTemplate(template)) {
      throw new TemplateError('Unbalanced braces in template', { template });
    }

    let result = TemplateSubstitution.resolveConditionals(template, variables, template, false);

    result = result.replace(FALLBACK_PATTERN, (_match, primary: string, fallback: string) => {
      if (hasVariable(variables, primary) && isTruthy(variables[primary])) {
        return render(variables[primary]);
      }
      if (hasVariable(variables, fallback) && isTruthy(variables[fallback])) {
        return render(variables[fallback]);
      }
      throw new TemplateError(`Neither '${primary}' nor '${fallback}' found in variables`, {
        template,
        variableName: primary
      });
    });

    result = TemplateSubstitution.substituteSimple(result, variables, template);

    return result.trim();
  }

  /**
   * Check that braces open and close in order
   */
  static validateTemplate(template: string): boolean {
    let depth = 0;
    for (const char of template) {
      if (char === '{') {
        depth++;
      } else if (char === '}') {
        depth--;
        if (depth < 0) return false;
      }
    }
    return depth === 0;
  }

  /**
   * Sorted unique variable names referenced by any marker
   */
  static extractVariables(template: string): string[] {
    const names = new Set<string>();

    for (const match of template.matchAll(CONDITION_NAME_PATTERN)) {
      names.add(match[1]);
    }

    for (const match of template.matchAll(FALLBACK_PATTERN)) {
      names.add(match[1]);
      names.add(match[2]);
    }

    for (const match of template.matchAll(SIMPLE_PATTERN)) {
      names.add(match[1]);
    }

    return [...names].sort();
  }

  /**
   * Resolve conditional markers left to right. A marker's body is only
   * rendered, nested markers included, when its flag is truthy.
   */
  private static resolveConditionals(
    text: string,
    variables: TemplateVariables,
    template: string,
    inBody: boolean
  ): string {
    const plain = (segment: string): string =>
      inBody ? TemplateSubstitution.substituteSimple(segment, variables, template) : segment;

    let output = '';
    let cursor = 0;

    for (;;) {
      const start = text.indexOf(CONDITIONAL_OPEN, cursor);
      if (start === -1) break;

      const end = findClosingBrace(text, start);
      if (end === -1) {
        throw new TemplateError('Unbalanced braces in template', { template });
      }

      output += plain(text.slice(cursor, start));
      cursor = end + 1;

      const marker = text.slice(start, end + 1);
      const header = CONDITIONAL_HEADER.exec(marker);
      if (!header) {
        // Not a conditional; leave it for the later passes
        output += marker;
        continue;
      }

      const condition = header[1];
      if (!hasVariable(variables, condition) || !isTruthy(variables[condition])) {
        continue;
      }

      const body = marker.slice(header[0].length, -1);
      const rendered = TemplateSubstitution.resolveConditionals(body, variables, template, true);
      output += rendered.length > 0 && !/^\s/.test(rendered) ? ` ${rendered}` : rendered;
    }

    return output + plain(text.slice(cursor));
  }

  private static substituteSimple(text: string, variables: TemplateVariables, template: string): string {
    return text.replace(SIMPLE_PATTERN, (_match, name: string) => {
      if (!hasVariable(variables, name)) {
        throw new TemplateError(`Missing template variable: ${name}`, { template, variableName: name });
      }
      return render(variables[name]);
    });
  }
}
