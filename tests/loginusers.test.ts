import { describe, test, expect } from "vitest";
import {
  displayNameFor,
  parseLoginUsers,
  personaNameFor,
  steamId64,
  syntheticName,
} from "../src/loginusers.js";
import { loginUsersVdf } from "./fixtures.js";

describe("parseLoginUsers", () => {
  test("maps records keyed by 64-bit SteamID to account ids", () => {
    const records = parseLoginUsers(loginUsersVdf([{ id: 1001, persona: "Alice" }, { id: 1002, persona: "Bob" }]));
    expect(records.status).toBe("parsed");
    expect(personaNameFor(records, 1001)).toBe("Alice");
    expect(personaNameFor(records, 1002)).toBe("Bob");
    expect(personaNameFor(records, 1003)).toBeUndefined();
  });

  test("accepts records keyed by account id", () => {
    const records = parseLoginUsers('"users" { "42" { "PersonaName" "Zed" } }');
    expect(personaNameFor(records, 42)).toBe("Zed");
  });

  test("ignores unknown fields, comments and key case", () => {
    const text = [
      "// written by Steam",
      '"users"',
      "{",
      '  "76561197960266729"',
      "  {",
      '    "AccountName"  "alice_acct"',
      '    "personaname"  "Alice"',
      '    "Extra"        { "Nested" "1" }',
      "  }",
      "}",
    ].join("\n");
    expect(personaNameFor(parseLoginUsers(text), 1001)).toBe("Alice");
  });

  test("unescapes quoted names", () => {
    const records = parseLoginUsers('"users" { "7" { "PersonaName" "Al \\"Ace\\" Ice" } }');
    expect(personaNameFor(records, 7)).toBe('Al "Ace" Ice');
  });

  test("uses a single unnamed top-level block as the record list", () => {
    const records = parseLoginUsers('"Accounts" { "5" { "PersonaName" "Five" } }');
    expect(personaNameFor(records, 5)).toBe("Five");
  });

  test("empty text parses to no records", () => {
    const records = parseLoginUsers("");
    expect(records).toEqual({ status: "parsed", personas: new Map() });
  });

  test("record without a persona maps to undefined", () => {
    const records = parseLoginUsers('"users" { "9" { "AccountName" "nine" } }');
    expect(records.status).toBe("parsed");
    if (records.status === "parsed") {
      expect(records.personas.has("9")).toBe(true);
      expect(records.personas.get("9")).toBeUndefined();
    }
  });

  test("unterminated string is unparseable", () => {
    expect(parseLoginUsers('"users" { "9" { "PersonaName" "Nin')).toEqual({
      status: "unparseable",
      reason: "unterminated quoted string",
    });
  });

  test("missing closing brace is unparseable", () => {
    expect(parseLoginUsers('"users" { "9" { "PersonaName" "Nine" }')).toEqual({
      status: "unparseable",
      reason: "unexpected end of input inside a block",
    });
  });

  test("stray closing brace is unparseable", () => {
    expect(parseLoginUsers('"users" { } }')).toEqual({
      status: "unparseable",
      reason: "unbalanced '}'",
    });
  });

  test("key without value is unparseable", () => {
    expect(parseLoginUsers('"users"')).toEqual({
      status: "unparseable",
      reason: 'missing value for key "users"',
    });
  });
});

describe("displayNameFor", () => {
  test("falls back to a synthetic name", () => {
    const unparseable = parseLoginUsers("{");
    expect(unparseable.status).toBe("unparseable");
    expect(displayNameFor(unparseable, 1001)).toBe("User_1001");
  });

  test("treats a blank persona as missing", () => {
    const records = parseLoginUsers('"users" { "3" { "PersonaName" "   " } }');
    expect(displayNameFor(records, 3)).toBe("User_3");
  });

  test("trims the persona", () => {
    const records = parseLoginUsers('"users" { "3" { "PersonaName" " Tri " } }');
    expect(displayNameFor(records, 3)).toBe("Tri");
  });
});

test("steamId64 offsets the account id", () => {
  expect(steamId64(1001)).toBe("76561197960266729");
  expect(steamId64(0)).toBe("76561197960265728");
});

test("syntheticName", () => {
  expect(syntheticName(77)).toBe("User_77");
});
