import { readFileSync } from "node:fs";
import { expandHome } from "../config/config";
import { MappingFileError, errorMessage } from "../errors";
import type { MappingEntry, MappingResult } from "../types";

/**
 * Split one CSV line into fields. A field may be wrapped in double quotes,
 * in which case commas inside it are kept and `""` stands for one quote.
 */
function splitFields(line: string): string[] {
  const fields: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch !== '"') {
        field += ch;
      } else if (line[i + 1] === '"') {
        field += '"';
        i++;
      } else {
        quoted = false;
      }
    } else if (ch === '"' && field.trim() === "") {
      field = "";
      quoted = true;
    } else if (ch === ",") {
      fields.push(field);
      field = "";
    } else {
      field += ch;
    }
  }

  fields.push(field);
  return fields;
}

/**
 * Parse `vaultItemId,keyPath` lines. Blank lines and # comments are ignored,
 * anything else that is not exactly two non-empty columns becomes a warning.
 */
export function parseMappingContent(content: string, home?: string): MappingResult {
  const entries: MappingEntry[] = [];
  const warnings: string[] = [];

  // Spreadsheet exports often start with a byte order mark
  const lines = content.replace(/^\uFEFF/, "").split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/\r$/, "");
    const trimmed = line.trim();
    const lineNumber = i + 1;

    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const columns = splitFields(trimmed);
    if (columns.length !== 2) {
      warnings.push(
        `Line ${lineNumber}: expected "vaultItemId,keyPath", got ${columns.length} column(s)`
      );
      continue;
    }

    const vaultItemId = columns[0].trim();
    const keyPath = columns[1].trim();
    if (!vaultItemId || !keyPath) {
      warnings.push(`Line ${lineNumber}: expected "vaultItemId,keyPath", found an empty field`);
      continue;
    }

    entries.push({ vaultItemId, keyPath: expandHome(keyPath, home), line: lineNumber });
  }

  return { entries, warnings };
}

export function readMapping(path: string): MappingResult {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new MappingFileError(path, errorMessage(err));
  }
  return parseMappingContent(content);
}
