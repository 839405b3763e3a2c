// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../i18n';
import { TemplateError } from '../util/exceptions';

/** The only substitution point a catalog template may contain. */
export const versionPlaceholder = 'version';

/** A parsed template: literal runs and version substitution points. */
export type TemplateSegment = { literal: string } | { placeholder: typeof versionPlaceholder };

/**
 * Parses a template into its segments.
 *
 * The grammar is literal text, `{version}`, and `{{` / `}}` for literal braces.
 * Anything else in braces, or an unbalanced brace, is a TemplateError.
 */
export function parseTemplate(template: string): Array<TemplateSegment> {
  // One of these tokens:
  // {{
  // }}
  // {name}
  // {
  // }
  // (anything that has no {}s)
  const tokenRegex = /{{|}}|{([^{}]+)}|{|}|[^{}]+/y;
  const segments = new Array<TemplateSegment>();
  let literal = '';

  for (;;) {
    const thisMatch = tokenRegex.exec(template);
    if (thisMatch === null) {
      break;
    }

    const wholeMatch = thisMatch[0];
    if (wholeMatch === '{{') {
      literal += '{';
      continue;
    }

    if (wholeMatch === '}}') {
      literal += '}';
      continue;
    }

    if (wholeMatch === '{' || wholeMatch === '}') {
      throw new TemplateError(template, i`Found a mismatched ${wholeMatch} in '${template}'. For a literal ${wholeMatch}, use ${wholeMatch}${wholeMatch} instead.`);
    }

    const name = thisMatch[1];
    if (name !== undefined) {
      if (name !== versionPlaceholder) {
        throw new TemplateError(template, i`Unknown placeholder {${name}} in '${template}'. Only {${versionPlaceholder}} is supported; to write the literal value, use '{{${name}}}' instead.`);
      }
      if (literal) {
        segments.push({ literal });
        literal = '';
      }
      segments.push({ placeholder: versionPlaceholder });
      continue;
    }

    literal += wholeMatch;
  }

  if (literal) {
    segments.push({ literal });
  }
  return segments;
}

/** Checks that a template is well formed, without a version to substitute. */
export function validateTemplate(template: string): void {
  parseTemplate(template);
}

/** Substitutes the version into every placeholder of the template. */
export function resolveTemplate(template: string, version: string): string {
  if (!version) {
    throw new TemplateError(template, i`An empty version cannot be substituted into '${template}'`);
  }
  return parseTemplate(template).map(each => 'literal' in each ? each.literal : version).join('');
}
