/**
 * Shader template expansion.
 *
 * Templates use `{{.Key}}` actions. `{{- ` trims whitespace before the
 * action and ` -}}` trims whitespace after it; `{{/* ... *\/}}` is a comment.
 * Nothing else is allowed between the braces.
 */

import { readFile, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { TemplateError } from "../errors.ts";
import type { ShaderVariant } from "./variants.ts";

export { SHADER_VARIANTS, type ShaderVariant } from "./variants.ts";

const OPEN = "{{";
const CLOSE = "}}";
const KEY_ACTION = /^\.([A-Za-z_][A-Za-z0-9_]*)$/;
const COMMENT_ACTION = /^\/\*[\s\S]*\*\/$/;

function lineAt(source: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index; i++) {
    if (source.charCodeAt(i) === 10) line++;
  }
  return line;
}

function isSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

/**
 * Substitute `values` into `source`.
 * Throws TemplateError for unknown keys and malformed actions.
 */
export function expandTemplate(
  source: string,
  values: Readonly<Record<string, string>>,
  templateName = "template",
): string {
  let out = "";
  let pos = 0;

  while (pos < source.length) {
    const start = source.indexOf(OPEN, pos);
    if (start === -1) {
      out += source.slice(pos);
      break;
    }

    const end = source.indexOf(CLOSE, start + OPEN.length);
    if (end === -1) {
      throw new TemplateError(templateName, lineAt(source, start), "unclosed action");
    }

    let inner = source.slice(start + OPEN.length, end);
    let text = source.slice(pos, start);

    if (inner.startsWith("-") && isSpace(inner[1])) {
      text = text.trimEnd();
      inner = inner.slice(1);
    }
    let trimAfter = false;
    if (inner.endsWith("-") && isSpace(inner[inner.length - 2])) {
      trimAfter = true;
      inner = inner.slice(0, -1);
    }
    out += text;

    const action = inner.trim();
    const keyMatch = KEY_ACTION.exec(action);
    if (keyMatch) {
      const key = keyMatch[1] ?? "";
      if (!Object.hasOwn(values, key)) {
        throw new TemplateError(
          templateName,
          lineAt(source, start),
          `can't evaluate field ${key}`,
        );
      }
      out += values[key] ?? "";
    } else if (!COMMENT_ACTION.test(action)) {
      throw new TemplateError(
        templateName,
        lineAt(source, start),
        `unsupported action "${OPEN}${inner}${CLOSE}"`,
      );
    }

    pos = end + CLOSE.length;
    if (trimAfter) {
      while (pos < source.length && isSpace(source[pos])) pos++;
    }
  }

  return out;
}

/**
 * Expand the template at `templatePath` with a variant's values and write
 * the result to `<workDir>/<basename>`. Returns the scratch path.
 */
export async function expandVariant(
  templatePath: string,
  variant: ShaderVariant,
  workDir: string,
): Promise<string> {
  const name = basename(templatePath);
  const source = await readFile(templatePath, "utf-8");
  const expanded = expandTemplate(source, variant.values, name);

  const scratchPath = join(workDir, name);
  await writeFile(scratchPath, expanded);
  return scratchPath;
}
