/**
 * Terminal color scheme
 * Using ansis for terminal styling
 */

import ansis from 'ansis';

/**
 * Metadata element fields
 */
export const element = {
  name: ansis.bold.hex('#B4F8C8'),
  qualifiedName: ansis.hex('#E6E6FA'),
  guid: ansis.dim.hex('#87CEEB'),
  type: ansis.italic.hex('#DDA0DD'),
  description: ansis.hex('#D0D0D0'),
};

/**
 * Output mode tags (DICT, REPORT, ...)
 */
export const mode = {
  ALL: ansis.bold.hex('#00FF87'),
  DICT: ansis.hex('#00D7FF'),
  JSON: ansis.hex('#00D7FF'),
  TABLE: ansis.hex('#00D7AF'),
  LIST: ansis.hex('#00D7AF'),
  MD: ansis.hex('#FFD700'),
  FORM: ansis.hex('#FFD700'),
  REPORT: ansis.hex('#FF8C00'),
  MERMAID: ansis.hex('#9370DB'),

  default: ansis.hex('#FFFFFF'),
};

/**
 * Status colors
 */
export const status = {
  success: ansis.bold.hex('#00FF87'),       // Bright green
  warning: ansis.bold.hex('#FFD700'),       // Gold
  error: ansis.bold.hex('#FF5F5F'),         // Red
  info: ansis.hex('#00D7FF'),               // Cyan
  dim: ansis.dim.hex('#808080'),            // Gray
};

/**
 * UI elements
 */
export const ui = {
  title: ansis.bold.hex('#FFD700'),         // Gold
  subtitle: ansis.hex('#00D7FF'),           // Cyan
  bullet: ansis.hex('#87CEEB'),             // Sky blue
  separator: ansis.dim.hex('#666666'),      // Dark gray
  header: ansis.bold.underline.hex('#B4F8C8'),
  key: ansis.hex('#9370DB'),                // Purple
  value: ansis.hex('#E6E6FA'),              // Lavender
  command: ansis.hex('#228B22'),            // Forest green for commands and options
};

/**
 * Color for an output mode tag
 */
export function modeColor(tag: string): typeof ansis {
  switch (tag.toUpperCase()) {
    case 'ALL': return mode.ALL;
    case 'DICT': return mode.DICT;
    case 'JSON': return mode.JSON;
    case 'TABLE': return mode.TABLE;
    case 'LIST': return mode.LIST;
    case 'MD': return mode.MD;
    case 'FORM': return mode.FORM;
    case 'REPORT': return mode.REPORT;
    case 'MERMAID': return mode.MERMAID;
    default: return mode.default;
  }
}

/**
 * Format a count with color
 */
export function coloredCount(count: number): string {
  if (count === 0) return status.dim(String(count));
  if (count > 100) return status.success(String(count));
  return ui.value(String(count));
}

/**
 * Create a visual separator
 */
export function separator(length: number = 80, char: string = '─'): string {
  return ui.separator(char.repeat(length));
}
