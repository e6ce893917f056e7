import { IdError } from "./errors";

// Keywords are case-insensitive in DOT and cannot be used as bare IDs.
const RESERVED_KEYWORDS = new Set(["graph", "digraph", "subgraph", "node", "edge", "strict"]);

const BARE_ID = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Inside a quoted DOT string only \" is an escape; any other backslash is kept
// literally, so a trailing one would swallow the closing quote.
const UNREPRESENTABLE = /[\u0000-\u001f\u007f\\]/;

function rejectionReason(name: string): string | undefined {
  if (name === "") return "must not be empty";
  if (UNREPRESENTABLE.test(name)) return "must not contain control characters or backslashes";
  return undefined;
}

/**
 * A Graphviz `ID`.
 *
 * Names made of ASCII letters, digits and underscores that do not start with a
 * digit are written as they are. Everything else that can be represented is
 * written as a double-quoted string, and so are the DOT keywords.
 */
export class Id {
  private constructor(
    public readonly name: string,
    public readonly quoted: boolean
  ) {}

  public static create(name: string): Id {
    const reason = rejectionReason(name);
    if (reason !== undefined) throw new IdError(name, reason);

    const bare = BARE_ID.test(name) && !RESERVED_KEYWORDS.has(name.toLowerCase());
    return new Id(name, !bare);
  }

  public static tryCreate(name: string): Id | undefined {
    if (rejectionReason(name) !== undefined) return undefined;
    return Id.create(name);
  }

  public toDotString(): string {
    if (!this.quoted) return this.name;
    return `"${this.name.replace(/"/g, '\\"')}"`;
  }

  public toString(): string {
    return this.toDotString();
  }
}
