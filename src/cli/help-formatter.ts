/**
 * Shared Help Formatter for Consistent Colored Output
 */

import { Command, Help } from 'commander';
import * as colors from './colors';
import ansis from 'ansis';

/** Terse one-line summaries shown in parent command listings */
const shortDescriptions = new WeakMap<Command, string>();

/**
 * Format description text: sentences ending with a colon become bold
 * section headers, output mode names are colored, and the text is broken
 * every couple of sentences.
 */
function formatDescription(text: string): string {
  if (!text) return '';

  const sentences = text.match(/[^.!?]+[.!?:]+/g) || [text];
  let output = '';
  let lineLength = 0;
  const maxLineLength = 100;

  sentences.forEach((raw, idx) => {
    const sentence = raw.trim();
    if (!sentence) return;

    if (sentence.endsWith(':')) {
      if (output && !output.endsWith('\n')) output += '\n';
      output += ansis.bold.cyan(sentence) + '\n';
      lineLength = 0;
      return;
    }

    const formatted = sentence.replace(/\b(ALL|ANY|DICT|JSON|TABLE|LIST|MD|FORM|REPORT|MERMAID)\b/g,
      (match) => colors.modeColor(match)(match));

    output += ansis.white(formatted);
    lineLength += sentence.length;

    if (lineLength > maxLineLength || (idx > 0 && idx % 2 === 0)) {
      output += '\n';
      lineLength = 0;
    } else {
      output += ' ';
    }
  });

  return output.trim();
}

/**
 * Wrap text to fit within a specific width, indenting continuation lines.
 * Widths are measured on the text with color codes stripped.
 */
function wrapText(text: string, maxWidth: number, indent: string = ''): string {
  const words = text.split(' ');
  const lines: string[] = [];
  let currentLine = '';

  for (const word of words) {
    const testLine = currentLine ? currentLine + ' ' + word : word;
    if (ansis.strip(testLine).length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, idx) => idx === 0 ? line : indent + line).join('\n');
}

function colorTerm(part: string): string {
  if ((part.startsWith('<') && part.endsWith('>')) || (part.startsWith('[') && part.endsWith(']'))) {
    return colors.status.dim(part);
  }
  if (part.includes('|')) {
    return part.split('|').map(a => colors.ui.command(a)).join('|');
  }
  if (part.startsWith('-') || /^[a-z]/.test(part)) {
    return colors.ui.command(part);
  }
  return part;
}

function formatRow(term: string, description: string, termWidth: number, availableWidth: number): string {
  const coloredTerm = term.split(/\s+/).map(colorTerm).join(' ');
  const padding = ' '.repeat(Math.max(2, termWidth - term.length + 2));
  const leftColumnWidth = 2 + term.length + padding.length;
  const wrapped = wrapText(
    colors.status.dim(description),
    Math.max(20, availableWidth - leftColumnWidth),
    ' '.repeat(leftColumnWidth)
  );
  return '  ' + coloredTerm + padding + wrapped + '\n';
}

/**
 * Set both a terse summary (for command listings) and a detailed
 * description (for --help)
 */
export function setCommandHelp(cmd: Command, summary: string, description: string): Command {
  shortDescriptions.set(cmd, summary);
  return cmd.description(description);
}

export function getShortDescription(cmd: Command): string | undefined {
  return shortDescriptions.get(cmd);
}

/**
 * Full help text for a command, as printed by --help
 */
export function formatColoredHelp(command: Command, helper: Help): string {
  const termWidth = helper.padWidth(command, helper);
  const availableWidth = process.stdout.columns || 100;
  let output = '';

  output += colors.ui.key('Usage: ') + colors.ui.value(helper.commandUsage(command)) + '\n\n';

  const desc = helper.commandDescription(command);
  if (desc) {
    output += formatDescription(desc) + '\n\n';
  }

  const args = helper.visibleArguments(command);
  if (args.length > 0) {
    output += colors.ui.header('Arguments') + '\n';
    for (const arg of args) {
      output += formatRow(helper.argumentTerm(arg), helper.argumentDescription(arg), termWidth, availableWidth);
    }
    output += '\n';
  }

  const opts = helper.visibleOptions(command);
  if (opts.length > 0) {
    output += colors.ui.header('Options') + '\n';
    for (const option of opts) {
      output += formatRow(helper.optionTerm(option), helper.optionDescription(option), termWidth, availableWidth);
    }
    output += '\n';
  }

  const commands = helper.visibleCommands(command);
  if (commands.length > 0) {
    output += colors.ui.header('Commands') + '\n';
    for (const subcommand of commands) {
      const description = getShortDescription(subcommand) || helper.subcommandDescription(subcommand);
      output += formatRow(helper.subcommandTerm(subcommand), description, termWidth, availableWidth);
    }
  }

  return output;
}

/**
 * Configure colored help for a command and all of its subcommands
 */
export function configureColoredHelp(cmd: Command): void {
  cmd.configureHelp({ formatHelp: formatColoredHelp });
  for (const sub of cmd.commands) {
    configureColoredHelp(sub);
  }
}
