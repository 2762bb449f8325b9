import { describe, it, expect } from 'vitest';
import {
  formatVersion,
  parseVersionTemplate,
  renderVersionTemplate,
  shortSha,
  versionData,
} from './version-format.js';
import { TemplateError } from './release-error.js';
import { createTestReleaseEvent } from '../testing/factories.js';

const event = createTestReleaseEvent({
  version: '1.2.3',
  tagName: 'v1.2.3',
  commitSha: 'abc123def456789',
});

// ---------------------------------------------------------------------------
// shortSha
// ---------------------------------------------------------------------------

describe('shortSha', () => {
  it.each([
    ['abc123def456789', 'abc123d'],
    ['abc', 'abc'],
    ['', ''],
    ['1234567', '1234567'],
    ['12345678', '1234567'],
  ])('shortSha(%j) → %j', (input, expected) => {
    expect(shortSha(input)).toBe(expected);
  });
});

// ---------------------------------------------------------------------------
// formatVersion
// ---------------------------------------------------------------------------

describe('formatVersion', () => {
  it.each([
    ['version only', '{{.Version}}', '1.2.3'],
    ['with prefix', 'v{{.Version}}', 'v1.2.3'],
    ['tag name', '{{.TagName}}', 'v1.2.3'],
    ['short SHA', '{{.Version}}-{{.ShortSHA}}', '1.2.3-abc123d'],
    ['complex format', 'release-{{.Version}}-{{.ShortSHA}}', 'release-1.2.3-abc123d'],
    ['spaces inside the action', 'app@{{ .Version }}', 'app@1.2.3'],
    ['literal text only', 'static', 'static'],
    ['empty template', '', ''],
    ['stray closing braces stay literal', '}}{{.Version}}', '}}1.2.3'],
  ])('%s', (_name, template, expected) => {
    expect(formatVersion(template, event)).toBe(expected);
  });

  it('is deterministic for the same input', () => {
    const template = '{{.TagName}}+{{.ShortSHA}}';
    expect(formatVersion(template, event)).toBe(formatVersion(template, event));
  });

  it('throws TemplateError for unknown fields', () => {
    expect(() => formatVersion('{{.Commit}}', event)).toThrow(TemplateError);
    expect(() => formatVersion('{{.Commit}}', event)).toThrow(
      "template: can't evaluate field Commit at offset 0 (known fields: Version, TagName, ShortSHA)",
    );
  });
});

// ---------------------------------------------------------------------------
// parseVersionTemplate
// ---------------------------------------------------------------------------

describe('parseVersionTemplate', () => {
  it('splits text and field nodes', () => {
    expect(parseVersionTemplate('v{{.Version}}-x')).toEqual([
      { kind: 'text', text: 'v' },
      { kind: 'field', name: 'Version', offset: 1 },
      { kind: 'text', text: '-x' },
    ]);
  });

  it('accepts unknown field names (checked at render time)', () => {
    expect(parseVersionTemplate('{{.Anything}}')).toEqual([
      { kind: 'field', name: 'Anything', offset: 0 },
    ]);
  });

  it('rejects an unclosed action', () => {
    expect(() => parseVersionTemplate('{{.Invalid')).toThrow(
      'template: unclosed action at offset 0',
    );
  });

  it('rejects an empty action', () => {
    expect(() => parseVersionTemplate('v{{ }}')).toThrow(
      'template: missing value for action at offset 1',
    );
  });

  it('rejects actions that are not field references', () => {
    expect(() => parseVersionTemplate('{{Version}}')).toThrow(
      'template: unexpected "Version" in action at offset 0',
    );
    expect(() => parseVersionTemplate('{{.Version | upper}}')).toThrow(TemplateError);
  });

  it('errors carry the version_format field', () => {
    try {
      parseVersionTemplate('{{');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TemplateError);
      if (err instanceof TemplateError) {
        expect(err.field).toBe('version_format');
      }
    }
  });
});

describe('renderVersionTemplate', () => {
  it('renders with explicit data', () => {
    const nodes = parseVersionTemplate('{{.TagName}}');
    expect(renderVersionTemplate(nodes, { Version: '', TagName: 'v9', ShortSHA: '' })).toBe('v9');
  });

  it('derives data from an event', () => {
    expect(versionData(event)).toEqual({
      Version: '1.2.3',
      TagName: 'v1.2.3',
      ShortSHA: 'abc123d',
    });
  });
});
