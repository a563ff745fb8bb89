/**
 * Token Model
 * Flat token variants and the index-addressed buffer they are built in
 */

// ============================================================
// TOKEN TYPES
// ============================================================

/** One function call; owns every token up to `index + delta` */
export interface FunctionToken {
  readonly type: 'function';
  /** Offset of the opening `{` */
  readonly offset: number;
  readonly name: string;
  /** Offset of the first name unit; the name spans [nameOffset, nameOffset + name.length) */
  readonly nameOffset: number;
  readonly numArgs: number;
  /** index + delta = one past the last token of this call */
  readonly delta: number;
  /** index + firstArgDelta = end-arg token of the first argument; undefined iff numArgs is 0 */
  readonly firstArgDelta: number | undefined;
}

/** One literal unit after escape resolution */
export interface CharacterToken {
  readonly type: 'character';
  readonly offset: number;
  readonly value: string;
}

/** Terminates one argument and links to the next sibling's end-arg */
export interface EndArgToken {
  readonly type: 'end-arg';
  /** Offset of the `,` or `}` that ended the argument */
  readonly offset: number;
  /** index + delta = next sibling end-arg; undefined on the last argument */
  readonly delta: number | undefined;
}

export type Token = FunctionToken | CharacterToken | EndArgToken;

export type TokenType = Token['type'];

// ============================================================
// TOKEN BUFFER
// ============================================================

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

type FunctionFields = Partial<
  Pick<FunctionToken, 'name' | 'numArgs' | 'delta' | 'firstArgDelta'>
>;

/**
 * Append-only token store whose function and end-arg slots can be
 * back-patched by index once the information they need is known.
 */
export class TokenBuffer {
  private readonly tokens: (
    | Mutable<FunctionToken>
    | CharacterToken
    | Mutable<EndArgToken>
  )[] = [];

  get length(): number {
    return this.tokens.length;
  }

  at(index: number): Token | undefined {
    return this.tokens[index];
  }

  /** Append a token and return its index */
  append(token: Token): number {
    this.tokens.push({ ...token });
    return this.tokens.length - 1;
  }

  /** Append a function token whose fields are filled in on close */
  appendFunctionPlaceholder(offset: number, nameOffset: number): number {
    return this.append({
      type: 'function',
      offset,
      name: '',
      nameOffset,
      numArgs: 0,
      delta: 0,
      firstArgDelta: undefined,
    });
  }

  patchFunction(index: number, fields: FunctionFields): void {
    const token = this.tokens[index];
    if (token?.type !== 'function') {
      throw new Error(`Internal error: no function token at index ${index}`);
    }
    if (fields.name !== undefined) token.name = fields.name;
    if (fields.numArgs !== undefined) token.numArgs = fields.numArgs;
    if (fields.delta !== undefined) token.delta = fields.delta;
    if ('firstArgDelta' in fields) token.firstArgDelta = fields.firstArgDelta;
  }

  patchEndArg(index: number, delta: number): void {
    const token = this.tokens[index];
    if (token?.type !== 'end-arg') {
      throw new Error(`Internal error: no end-arg token at index ${index}`);
    }
    token.delta = delta;
  }

  /** Hand the tokens over as an immutable sequence */
  finish(): readonly Token[] {
    return Object.freeze(this.tokens.map((token) => Object.freeze(token)));
  }
}
