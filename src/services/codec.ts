import { SyncError } from "../shared/errors.js";

/** Survey-format codec boundary. The engine never looks inside a document. */
export interface ProjectCodec<Doc> {
  readonly extension: string;
  parse(bytes: Uint8Array): Doc;
  serialize(doc: Doc): Uint8Array;
  /** Survey data files the project file points at, relative to it, POSIX separators. */
  referencedFiles(doc: Doc): string[];
  equals(a: Doc, b: Doc): boolean;
}

// ── Compass project (.mak) ──

export type MakSettingCode = "@" | "&" | "%" | "*" | "!" | "$";

export type MakStatement =
  | { kind: "file"; file: string; params: string }
  | { kind: "setting"; code: MakSettingCode; value: string };

export interface MakDocument {
  statements: MakStatement[];
}

const SETTING_CODES: readonly string[] = ["@", "&", "%", "*", "!", "$"];

function isSettingCode(c: string): c is MakSettingCode {
  return SETTING_CODES.includes(c);
}

function stripComments(text: string): string {
  return text
    .split(/\r?\n/)
    .filter((line) => !line.trimStart().startsWith("/"))
    .join("\n");
}

function collapse(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function parseStatement(raw: string): MakStatement {
  const head = raw[0];
  const body = raw.slice(1);
  if (head === "#") {
    const comma = body.indexOf(",");
    const file = collapse(comma === -1 ? body : body.slice(0, comma));
    const params = comma === -1 ? "" : collapse(body.slice(comma + 1));
    if (!file) throw new SyncError("SerializationError", "Project file reference without a file name");
    return { kind: "file", file, params };
  }
  if (isSettingCode(head)) {
    return { kind: "setting", code: head, value: collapse(body) };
  }
  throw new SyncError("SerializationError", `Unrecognized project statement: ${raw.slice(0, 40)}`);
}

export const makCodec: ProjectCodec<MakDocument> = {
  extension: ".mak",

  parse(bytes) {
    const text = stripComments(Buffer.from(bytes).toString("latin1"));
    const parts = text.split(";");
    const tail = parts.pop() ?? "";
    if (tail.trim() !== "") {
      throw new SyncError("SerializationError", "Project file ends with an unterminated statement");
    }
    const statements = parts
      .map((p) => p.trim())
      .filter((p) => p !== "")
      .map(parseStatement);
    return { statements };
  },

  serialize(doc) {
    const lines = doc.statements.map((s) =>
      s.kind === "file"
        ? `#${s.file}${s.params ? `,${s.params}` : ""};`
        : `${s.code}${s.value};`
    );
    return Buffer.from(lines.join("\r\n") + "\r\n", "latin1");
  },

  referencedFiles(doc) {
    return doc.statements.flatMap((s) =>
      s.kind === "file" ? [s.file.replace(/\\/g, "/")] : []
    );
  },

  equals(a, b) {
    if (a.statements.length !== b.statements.length) return false;
    return a.statements.every((s, i) => {
      const o = b.statements[i];
      if (s.kind === "file") return o.kind === "file" && o.file === s.file && o.params === s.params;
      return o.kind === "setting" && o.code === s.code && o.value === s.value;
    });
  },
};

/** parse(serialize(parse(bytes))) must equal parse(bytes). Returns the parsed document. */
export function verifyRoundTrip<Doc>(codec: ProjectCodec<Doc>, bytes: Uint8Array): Doc {
  const doc = codec.parse(bytes);
  const again = codec.parse(codec.serialize(doc));
  if (!codec.equals(doc, again)) {
    throw new SyncError("SerializationError", "Project file does not survive a parse/serialize round trip");
  }
  return doc;
}
