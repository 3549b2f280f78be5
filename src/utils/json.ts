export type JsonObject = Record<string, unknown>;

export function isPlainRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Strips a markdown fence or leading prose so that only the JSON payload
 * remains. Text that already starts with `{` or `[` is only trimmed.
 */
export function stripJsonWrapper(rawText: string): string {
  let text = rawText.trim();

  if (text.startsWith("```")) {
    text = text.replace(/^```[a-zA-Z0-9_-]*\s*\n?/, "");
    text = text.replace(/```\s*$/, "").trim();
  }

  if (!text.startsWith("{") && !text.startsWith("[")) {
    const firstBrace = text.indexOf("{");
    const lastBrace = text.lastIndexOf("}");
    if (firstBrace !== -1 && lastBrace > firstBrace) {
      text = text.slice(firstBrace, lastBrace + 1).trim();
    }
  }

  return text;
}

/** Escapes raw CR/LF characters that appear inside string literals. */
export function escapeRawNewlines(jsonText: string): string {
  let output = "";
  let inString = false;
  let escaped = false;
  for (const char of jsonText) {
    if (!inString) {
      inString = char === '"';
      output += char;
      continue;
    }
    if (escaped) {
      escaped = false;
      output += char;
    } else if (char === "\\") {
      escaped = true;
      output += char;
    } else if (char === '"') {
      inString = false;
      output += char;
    } else if (char === "\n") {
      output += "\\n";
    } else if (char === "\r") {
      output += "\\r";
    } else {
      output += char;
    }
  }
  return output;
}

export function parseModelJson(rawText: string): unknown {
  return JSON.parse(escapeRawNewlines(stripJsonWrapper(rawText)));
}
