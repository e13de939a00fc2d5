// Steam keeps the accounts that have signed in on a machine in
// config/loginusers.vdf, a KeyValues text file:
//
//   "users"
//   {
//     "76561197960266729"
//     {
//       "AccountName"   "alice_acct"
//       "PersonaName"   "Alice"
//     }
//   }
//
// Records are keyed by 64-bit SteamID, userdata/ by 32-bit account id.

const STEAM_ID64_BASE = 76561197960265728n;

type VdfValue = string | VdfObject;
interface VdfObject extends Map<string, VdfValue> {}

type Token = { type: "string"; value: string } | { type: "open" } | { type: "close" };

export type LoginRecords =
  | { status: "parsed"; personas: Map<string, string | undefined> }
  | { status: "unparseable"; reason: string };

class VdfSyntaxError extends Error {}

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", "\\": "\\", '"': '"' };

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (/\s/.test(ch)) {
      i++;
    } else if (ch === "/" && text[i + 1] === "/") {
      while (i < text.length && text[i] !== "\n") i++;
    } else if (ch === "{") {
      tokens.push({ type: "open" });
      i++;
    } else if (ch === "}") {
      tokens.push({ type: "close" });
      i++;
    } else if (ch === '"') {
      i++;
      let value = "";
      while (i < text.length && text[i] !== '"') {
        if (text[i] === "\\" && i + 1 < text.length) {
          const next = text[i + 1];
          value += ESCAPES[next] ?? next;
          i += 2;
        } else {
          value += text[i];
          i++;
        }
      }
      if (i >= text.length) {
        throw new VdfSyntaxError("unterminated quoted string");
      }
      i++;
      tokens.push({ type: "string", value });
    } else {
      let value = "";
      while (i < text.length && !/[\s{}"]/.test(text[i])) {
        value += text[i];
        i++;
      }
      // Platform conditionals such as [$WIN32] carry no data.
      if (!value.startsWith("[")) {
        tokens.push({ type: "string", value });
      }
    }
  }

  return tokens;
}

function parseObject(tokens: Token[], start: number, nested: boolean): [VdfObject, number] {
  const obj: VdfObject = new Map<string, VdfValue>();
  let pos = start;

  for (;;) {
    const token = tokens[pos];
    if (token === undefined) {
      if (nested) throw new VdfSyntaxError("unexpected end of input inside a block");
      return [obj, pos];
    }
    if (token.type === "close") {
      if (!nested) throw new VdfSyntaxError("unbalanced '}'");
      return [obj, pos + 1];
    }
    if (token.type === "open") {
      throw new VdfSyntaxError("block without a key");
    }

    const value = tokens[pos + 1];
    if (value === undefined) {
      throw new VdfSyntaxError(`missing value for key "${token.value}"`);
    }
    if (value.type === "open") {
      const [child, next] = parseObject(tokens, pos + 2, true);
      obj.set(token.value, child);
      pos = next;
    } else if (value.type === "string") {
      obj.set(token.value, value.value);
      pos += 2;
    } else {
      throw new VdfSyntaxError(`missing value for key "${token.value}"`);
    }
  }
}

function lookup(obj: VdfObject, key: string): VdfValue | undefined {
  const wanted = key.toLowerCase();
  for (const [k, v] of obj) {
    if (k.toLowerCase() === wanted) return v;
  }
  return undefined;
}

function recordContainer(root: VdfObject): VdfObject {
  const users = lookup(root, "users");
  if (users instanceof Map) return users;
  const blocks = [...root.values()].filter((v): v is VdfObject => v instanceof Map);
  if (blocks.length === 1 && root.size === 1) return blocks[0];
  return root;
}

/** Decode loginusers.vdf. Never throws; malformed input comes back as "unparseable". */
export function parseLoginUsers(text: string): LoginRecords {
  let root: VdfObject;
  try {
    [root] = parseObject(tokenize(text), 0, false);
  } catch (e) {
    if (e instanceof VdfSyntaxError) {
      return { status: "unparseable", reason: e.message };
    }
    throw e;
  }

  const personas = new Map<string, string | undefined>();
  for (const [key, record] of recordContainer(root)) {
    if (!(record instanceof Map)) continue;
    const persona = lookup(record, "PersonaName");
    personas.set(key, typeof persona === "string" ? persona : undefined);
  }
  return { status: "parsed", personas };
}

export function steamId64(accountId: number): string {
  return (BigInt(accountId) + STEAM_ID64_BASE).toString();
}

export function personaNameFor(records: LoginRecords, accountId: number): string | undefined {
  if (records.status !== "parsed") return undefined;
  return records.personas.get(String(accountId)) ?? records.personas.get(steamId64(accountId));
}

export function syntheticName(accountId: number): string {
  return `User_${accountId}`;
}

/** Persona name for an account, or `User_<id>` when none can be found. */
export function displayNameFor(records: LoginRecords, accountId: number): string {
  const persona = personaNameFor(records, accountId)?.trim();
  return persona ? persona : syntheticName(accountId);
}
