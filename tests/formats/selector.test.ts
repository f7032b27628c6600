/**
 * Format set selector tests
 *
 * Tests: format choice per mode, Default fallback, no-match results,
 * merge replacing a definition
 */

import { FormatSetRegistry, createBuiltinRegistry } from '../../src/formats/registry';
import { describe as describeSet, findFormat, noMatchMessage, select, supportedModes } from '../../src/formats/selector';
import { projectElement, rowToRecord } from '../../src/formats/projector';
import { EgeriaElement } from '../../src/types';

const widgetsDeclaration = {
  heading: 'Widget Attributes',
  aliases: ['Widget'],
  formats: [
    {
      types: ['ALL'],
      columns: [
        { name: 'Name', key: 'display_name' },
        { name: 'GUID', key: 'guid' },
      ],
    },
  ],
};

const defaultDeclaration = {
  heading: 'Default',
  formats: [{ types: ['ALL'], columns: [{ name: 'Display Name', key: 'display_name' }] }],
};

const widgetOne: EgeriaElement = {
  elementHeader: { guid: 'abc-123', type: { typeName: 'Widget' } },
  properties: { displayName: 'Widget One' },
};

function widgetsRegistry(): FormatSetRegistry {
  const registry = new FormatSetRegistry();
  registry.merge({ Default: defaultDeclaration, Widgets: widgetsDeclaration });
  return registry;
}

describe('select', () => {
  it('should round-trip a registered set through projection', () => {
    const registry = widgetsRegistry();

    const selection = select(registry, 'Widgets', 'DICT');

    expect(selection.ok).toBe(true);
    if (!selection.ok) return;
    expect(selection.resolvedName).toBe('Widgets');
    expect(selection.usedFallback).toBe(false);
    expect(selection.format.columns.map(c => c.key)).toEqual(['display_name', 'guid']);
    expect(rowToRecord(projectElement(widgetOne, selection.format))).toEqual({
      Name: 'Widget One',
      GUID: 'abc-123',
    });
  });

  it('should resolve aliases to the same set as the canonical name', () => {
    const registry = widgetsRegistry();
    const byName = select(registry, 'Widgets', 'REPORT');
    const byAlias = select(registry, 'Widget', 'REPORT');

    expect(byAlias.ok && byAlias.formatSet).toBe(byName.ok && byName.formatSet);
  });

  it('should fall back to Default for an unknown kind', () => {
    const selection = select(widgetsRegistry(), 'UnknownKind', 'DICT');

    expect(selection.ok).toBe(true);
    if (!selection.ok) return;
    expect(selection.resolvedName).toBe('Default');
    expect(selection.usedFallback).toBe(true);
    expect(selection.kindName).toBe('UnknownKind');
  });

  it('should report no match for an unknown kind without a Default set', () => {
    const registry = new FormatSetRegistry();
    registry.merge({ Widgets: widgetsDeclaration });

    expect(select(registry, 'UnknownKind', 'dict')).toEqual({
      ok: false,
      reason: 'unknown-kind',
      message: "No matching column set found for kind='UnknownKind' and output type='DICT'.",
    });
  });

  it('should report no match for a mode no Format declares', () => {
    const registry = new FormatSetRegistry();
    registry.merge({
      Reports: { formats: [{ types: ['REPORT'], columns: [{ name: 'Name', key: 'display_name' }] }] },
    });

    expect(select(registry, 'Reports', 'MERMAID')).toEqual({
      ok: false,
      reason: 'unsupported-mode',
      message: noMatchMessage('Reports', 'MERMAID'),
    });
  });

  it('should pick the first declared Format that matches', () => {
    const registry = new FormatSetRegistry();
    registry.merge({
      Mixed: {
        formats: [
          { types: ['TABLE'], columns: [{ name: 'Table Name', key: 'display_name' }] },
          { types: ['ALL'], columns: [{ name: 'Any Name', key: 'display_name' }] },
          { types: ['DICT'], columns: [{ name: 'Dict Name', key: 'display_name' }] },
        ],
      },
    });

    const table = select(registry, 'Mixed', 'table');
    const dict = select(registry, 'Mixed', 'DICT');

    expect(table.ok && table.format.columns[0].name).toBe('Table Name');
    expect(dict.ok && dict.format.columns[0].name).toBe('Any Name');
  });

  it('should cover every mode a built-in Format declares', () => {
    const registry = createBuiltinRegistry();

    for (const [name, formatSet] of registry.entries()) {
      for (const format of formatSet.formats) {
        for (const mode of format.types.filter(t => t !== 'ALL')) {
          const selection = select(registry, name, mode);
          expect(selection.ok).toBe(true);
          if (selection.ok) {
            expect(findFormat(formatSet, mode)).toBe(selection.format);
          }
        }
      }
    }
  });

  it('should use the new columns after a merge redefines a set', () => {
    const registry = widgetsRegistry();
    registry.merge({
      Widgets: {
        formats: [{ types: ['ALL'], columns: [{ name: 'Label', key: 'display_name' }, { name: 'Kind', key: 'type_name' }] }],
      },
    });

    const selection = select(registry, 'Widgets', 'DICT');

    expect(selection.ok).toBe(true);
    if (!selection.ok) return;
    expect(rowToRecord(projectElement(widgetOne, selection.format))).toEqual({
      Label: 'Widget One',
      Kind: 'Widget',
    });
  });
});

describe('describe', () => {
  it('should return the set without falling back to Default', () => {
    const registry = widgetsRegistry();

    expect(describeSet(registry, 'Widget')?.name).toBe('Widgets');
    expect(describeSet(registry, 'UnknownKind')).toBeUndefined();
  });
});

describe('supportedModes', () => {
  it('should list distinct declared types in sorted order', () => {
    const registry = createBuiltinRegistry();
    const collections = registry.lookup('Collections');

    expect(collections && supportedModes(collections)).toEqual(['ALL', 'DICT', 'MERMAID', 'REPORT', 'TABLE']);
  });
});
