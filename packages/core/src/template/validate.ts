import { TemplateError, type ContractSite } from "../errors/trace-errors";

/** A message template rewritten to positional `{i}` markers, split for fast rendering. */
export type ValidatedTemplate = {
  readonly source: string;
  readonly positional: string;
  /** Literal text interleaved with parameter indices. */
  readonly segments: readonly (string | number)[];
};

// Any brace-delimited run without nested braces, or a lone brace.
const BRACE_TOKEN = /\{[^{}]*\}|[{}]/g;
const POSITIONAL_MARKER = /^\{(\d+)\}$/;

/**
 * Rewrites every `{name}` placeholder to the index of the first parameter with that name,
 * then rejects whatever brace token is left that is not an in-range `{digits}` marker.
 *
 * @example
 * validateTemplate("Hello {name}", ["name"]).positional => "Hello {0}"
 */
export function validateTemplate(
  template: string,
  parameterNames: readonly string[],
  site: ContractSite,
): ValidatedTemplate {
  let positional = template;
  parameterNames.forEach((name, index) => {
    positional = positional.replaceAll(`{${name}}`, `{${index}}`);
  });

  const segments: (string | number)[] = [];
  let cursor = 0;
  for (const match of positional.matchAll(BRACE_TOKEN)) {
    const token = match[0];
    const marker = POSITIONAL_MARKER.exec(token);
    const index = marker?.[1] === undefined ? -1 : Number(marker[1]);
    if (index < 0 || index >= parameterNames.length) {
      throw new TemplateError(token, template, site);
    }

    const start = match.index ?? 0;
    if (start > cursor) segments.push(positional.slice(cursor, start));
    segments.push(index);
    cursor = start + token.length;
  }
  if (cursor < positional.length) segments.push(positional.slice(cursor));

  return { source: template, positional, segments };
}
