/**
 * Delimited Text Parser
 *
 * Parses the SCImago export format: `;`-separated, optional double quotes,
 * `""` as an escaped quote. A quote only closes a field when it is followed
 * (after optional spaces or tabs) by the delimiter or the end of the line, so
 * stray quotes inside titles (e.g. `"Wei sheng "yan jiu" bian ji bu"`) survive.
 */

function isBlank(char: string): boolean {
  return char === ' ' || char === '\t';
}

export const DEFAULT_DELIMITER = ';';

export function parseDelimitedLine(line: string, delimiter: string = DEFAULT_DELIMITER): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (inQuotes) {
      if (char !== '"') {
        current += char;
        continue;
      }

      if (line[i + 1] === '"') {
        current += '"';
        i++;
        continue;
      }

      let next = i + 1;
      while (next < line.length && isBlank(line[next])) {
        next++;
      }
      if (next >= line.length || line[next] === delimiter) {
        inQuotes = false;
        i = next - 1;
      } else {
        current += char;
      }
    } else if (char === '"' && current.trim() === '') {
      inQuotes = true;
      current = '';
    } else if (char === delimiter) {
      fields.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  fields.push(current.trim());

  return fields;
}

/**
 * Split file content into non-blank lines, dropping a UTF-8 BOM
 */
export function splitLines(content: string): string[] {
  return content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);
}

export interface DelimitedTable {
  header: string[];
  rows: string[][];
}

export function parseDelimitedTable(content: string, delimiter: string = DEFAULT_DELIMITER): DelimitedTable | null {
  const lines = splitLines(content);
  if (lines.length === 0) {
    return null;
  }

  const [headerLine, ...dataLines] = lines;
  return {
    header: parseDelimitedLine(headerLine, delimiter),
    rows: dataLines.map((line) => parseDelimitedLine(line, delimiter)),
  };
}
