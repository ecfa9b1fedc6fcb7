import { Result, ok, err } from "../result/result.js";

export type JsonPointerError =
  | { type: "invalidSyntax"; message: string }
  | { type: "invalidEscape"; message: string };

export type JsonPointer = string[];

const BAD_ESCAPE = /~(?![01])/;

function unescapeToken(token: string): Result<string, JsonPointerError> {
  const bad = BAD_ESCAPE.exec(token);
  if (bad) {
    const at = bad.index;
    return err({
      type: "invalidEscape",
      message:
        at === token.length - 1
          ? `Incomplete escape at position ${at}`
          : `Invalid escape ~${token[at + 1]} at position ${at}`,
    });
  }
  // "~01" is "~1" unescaped, so "~1" goes first
  return ok(token.replace(/~1/g, "/").replace(/~0/g, "~"));
}

function escapeToken(token: string): string {
  return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Split a pointer into unescaped tokens. Takes plain pointers ("/a/b") as
 * well as percent-encoded fragments ("#/a/b"); "" and "#" name the root.
 */
export function parseJsonPointer(pointer: string): Result<JsonPointer, JsonPointerError> {
  if (pointer === "" || pointer === "#") {
    return ok([]);
  }

  let body = pointer;
  if (pointer.startsWith("#")) {
    try {
      body = decodeURIComponent(pointer.slice(1));
    } catch {
      return err({
        type: "invalidSyntax",
        message: `Malformed percent-encoding in "${pointer}"`,
      });
    }
  }

  if (!body.startsWith("/")) {
    return err({
      type: "invalidSyntax",
      message: "JSON Pointer must start with '/'",
    });
  }

  const tokens: JsonPointer = [];
  for (const raw of body.slice(1).split("/")) {
    const token = unescapeToken(raw);
    if (!token.success) return token;
    tokens.push(token.data);
  }
  return ok(tokens);
}

/**
 * Canonical fragment spelling of a pointer, e.g. ["a b", "c"] → "#/a%20b/c".
 */
export function formatJsonPointer(pointer: JsonPointer): string {
  if (pointer.length === 0) return "#";
  return "#/" + pointer.map((token) => encodeURIComponent(escapeToken(token))).join("/");
}
