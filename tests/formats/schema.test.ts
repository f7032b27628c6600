/**
 * Format set schema tests
 *
 * Tests: declaration validation and normalization of the legacy shapes
 */

import { isOutputMode, parseFormatSet, parseFormatSetFile, toSerializable } from '../../src/formats/schema';

describe('parseFormatSet', () => {
  it('should accept a canonical declaration and apply defaults', () => {
    const result = parseFormatSet({
      target_type: 'Widget',
      heading: 'Widget Attributes',
      formats: [{ types: ['dict', 'Table'], columns: [{ name: 'Display Name', key: 'display_name' }] }],
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.formatSet).toEqual({
      target_type: 'Widget',
      heading: 'Widget Attributes',
      description: '',
      aliases: [],
      annotations: {},
      formats: [
        { types: ['DICT', 'TABLE'], columns: [{ name: 'Display Name', key: 'display_name', format: false }] },
      ],
    });
    expect(result.warnings).toEqual([]);
  });

  it('should turn a top-level columns list into one ALL format', () => {
    const result = parseFormatSet({
      heading: 'Legacy',
      columns: [{ name: 'GUID', key: 'guid', format: true }],
    });

    expect(result.ok && result.formatSet.formats).toEqual([
      { types: ['ALL'], columns: [{ name: 'GUID', key: 'guid', format: true }] },
    ]);
  });

  it('should read entity_type, attributes and user_params', () => {
    const result = parseFormatSet({
      entity_type: 'Gadget',
      formats: [{ types: ['ALL'], attributes: [{ name: 'Name', key: 'display_name' }] }],
      action: { function: 'GadgetManager.find_gadgets', user_params: ['search_string'] },
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.formatSet.target_type).toBe('Gadget');
    expect(result.formatSet.formats[0].columns).toEqual([{ name: 'Name', key: 'display_name', format: false }]);
    expect(result.formatSet.action).toEqual({
      function: 'GadgetManager.find_gadgets',
      required_params: ['search_string'],
      optional_params: [],
      spec_params: {},
    });
  });

  it('should use the first action of a list and warn', () => {
    const result = parseFormatSet({
      columns: [{ name: 'Name', key: 'display_name' }],
      action: [{ function: 'A.first' }, { function: 'B.second' }],
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.formatSet.action?.function).toBe('A.first');
    expect(result.warnings).toEqual(['action was given as a list; using the first entry (A.first)']);
  });

  it('should reject a declaration without formats or columns', () => {
    const result = parseFormatSet({ heading: 'Nothing here' });

    expect(result).toEqual({ ok: false, issues: ['formats: a format set needs a formats or columns list'] });
  });

  it('should reject an empty formats list', () => {
    const result = parseFormatSet({ formats: [] });

    expect(result).toEqual({ ok: false, issues: ['formats: a format set needs at least one Format'] });
  });

  it('should reject a Format without types', () => {
    const result = parseFormatSet({ formats: [{ types: [], columns: [] }] });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues).toEqual(['formats.0.types: a Format must declare at least one output type']);
  });

  it('should reject a column without a key', () => {
    const result = parseFormatSet({ columns: [{ name: 'No Key' }] });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues[0]).toMatch(/^columns\.0\.key: /);
  });
});

describe('parseFormatSetFile', () => {
  it('should return one entry per kind in file order', () => {
    const entries = parseFormatSetFile({
      Widgets: { columns: [{ name: 'Name', key: 'display_name' }] },
      Broken: { heading: 'no columns' },
    });

    expect(entries?.map(e => [e.name, e.result.ok])).toEqual([
      ['Widgets', true],
      ['Broken', false],
    ]);
  });

  it('should return undefined for a body that is not an object', () => {
    expect(parseFormatSetFile([1, 2, 3])).toBeUndefined();
    expect(parseFormatSetFile('text')).toBeUndefined();
  });
});

describe('toSerializable', () => {
  it('should produce the canonical form that parses back unchanged', () => {
    const first = parseFormatSet({
      entity_type: 'Widget',
      family: 'Things',
      columns: [{ name: 'Name', key: 'display_name' }],
    });
    if (!first.ok) throw new Error('expected a valid declaration');

    const written = toSerializable(first.formatSet);
    const second = parseFormatSet(JSON.parse(JSON.stringify(written)));

    expect(written.target_type).toBe('Widget');
    expect(second.ok && second.formatSet).toEqual(first.formatSet);
  });
});

describe('isOutputMode', () => {
  it('should know the upper-case mode names only', () => {
    expect(isOutputMode('REPORT')).toBe(true);
    expect(isOutputMode('report')).toBe(false);
    expect(isOutputMode('ALL')).toBe(false);
  });
});
