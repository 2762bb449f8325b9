/**
 * Release version templating.
 *
 * Templates are literal text with `{{ .Field }}` actions. Three fields
 * exist: `Version`, `TagName` and `ShortSHA` (first 7 characters of the
 * commit SHA). Parsing checks syntax only, so validate() can check a
 * template without a release event; rendering also rejects unknown
 * fields.
 *
 * @example
 * ```ts
 * formatVersion('release-{{.Version}}-{{.ShortSHA}}', event); // 'release-1.2.3-abc123d'
 * ```
 */

import type { ReleaseEvent } from '../types/release.js';
import { TemplateError } from './release-error.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const VERSION_FIELDS = ['Version', 'TagName', 'ShortSHA'] as const;

export type VersionField = (typeof VERSION_FIELDS)[number];

export type VersionData = Record<VersionField, string>;

export type TemplateNode =
  | { kind: 'text'; text: string }
  | { kind: 'field'; name: string; offset: number };

const OPEN = '{{';
const CLOSE = '}}';
const FIELD_ACTION = /^\.([A-Za-z_][A-Za-z0-9_]*)$/;

function isVersionField(name: string): name is VersionField {
  return VERSION_FIELDS.some((field) => field === name);
}

// ---------------------------------------------------------------------------
// shortSha()
// ---------------------------------------------------------------------------

/** First 7 characters of a SHA, or the whole string when shorter. */
export function shortSha(sha: string): string {
  return sha.length > 7 ? sha.slice(0, 7) : sha;
}

// ---------------------------------------------------------------------------
// Parse
// ---------------------------------------------------------------------------

/**
 * Split a template into text and field nodes.
 *
 * @throws TemplateError on an unclosed, empty or malformed action.
 */
export function parseVersionTemplate(template: string): TemplateNode[] {
  const nodes: TemplateNode[] = [];
  let pos = 0;

  while (pos < template.length) {
    const open = template.indexOf(OPEN, pos);
    if (open === -1) {
      nodes.push({ kind: 'text', text: template.slice(pos) });
      break;
    }
    if (open > pos) {
      nodes.push({ kind: 'text', text: template.slice(pos, open) });
    }

    const close = template.indexOf(CLOSE, open + OPEN.length);
    if (close === -1) {
      throw new TemplateError(`template: unclosed action at offset ${open}`);
    }

    const action = template.slice(open + OPEN.length, close).trim();
    if (action === '') {
      throw new TemplateError(`template: missing value for action at offset ${open}`);
    }
    const match = FIELD_ACTION.exec(action);
    if (match === null || match[1] === undefined) {
      throw new TemplateError(`template: unexpected "${action}" in action at offset ${open}`);
    }

    nodes.push({ kind: 'field', name: match[1], offset: open });
    pos = close + CLOSE.length;
  }

  return nodes;
}

// ---------------------------------------------------------------------------
// Render
// ---------------------------------------------------------------------------

/**
 * Render parsed nodes against version data.
 *
 * @throws TemplateError when a field is not one of VERSION_FIELDS.
 */
export function renderVersionTemplate(nodes: TemplateNode[], data: VersionData): string {
  let out = '';
  for (const node of nodes) {
    if (node.kind === 'text') {
      out += node.text;
      continue;
    }
    if (!isVersionField(node.name)) {
      throw new TemplateError(
        `template: can't evaluate field ${node.name} at offset ${node.offset}` +
          ` (known fields: ${VERSION_FIELDS.join(', ')})`,
      );
    }
    out += data[node.name];
  }
  return out;
}

/** Version data derived from a release event. */
export function versionData(event: ReleaseEvent): VersionData {
  return {
    Version: event.version,
    TagName: event.tagName,
    ShortSHA: shortSha(event.commitSha),
  };
}

/**
 * Render the release version for an event.
 *
 * @throws TemplateError if the template does not parse or names an unknown field.
 */
export function formatVersion(template: string, event: ReleaseEvent): string {
  return renderVersionTemplate(parseVersionTemplate(template), versionData(event));
}
