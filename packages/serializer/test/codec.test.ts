import { describe, it, expect } from "vitest";
import dedent from "dedent";
import { parseForm, stringifyForm } from "../src/index.js";

const form = { name: "x", isactive: true, value: 42, type: "X" };

describe("stringifyForm", () => {
  it("writes indented JSON by default", () => {
    expect(stringifyForm(form)).toBe(dedent`
      {
        "name": "x",
        "isactive": true,
        "value": 42,
        "type": "X"
      }`);
  });

  it("writes YAML", () => {
    expect(stringifyForm(form, "yaml")).toBe(
      dedent`
        name: x
        isactive: true
        value: 42
        type: X` + "\n"
    );
  });
});

describe("parseForm", () => {
  it("reads JSON", () => {
    expect(parseForm('{"name": "x", "friend": {"$ref": "#"}}')).toEqual({
      success: true,
      data: { name: "x", friend: { $ref: "#" } },
    });
  });

  it("reads YAML", () => {
    const text = dedent`
      name: x
      tags:
        - a
        - b
      friend:
        $ref: "#"
    `;
    expect(parseForm(text, "yaml")).toEqual({
      success: true,
      data: { name: "x", tags: ["a", "b"], friend: { $ref: "#" } },
    });
  });

  it("reports syntax errors", () => {
    const result = parseForm("{not json", "json");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("invalidDocument");
      expect(result.error.message).toMatch(/^Cannot parse json: /);
    }
  });

  it("rejects values that are not plain", () => {
    expect(parseForm("value: .inf", "yaml")).toEqual({
      success: false,
      error: { type: "invalidDocument", message: "Decoded yaml is not a plain value" },
    });
  });
});
