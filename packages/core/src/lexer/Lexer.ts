import { Token } from "./Token";
import { COMPARISON_TOKENS, TokenType } from "./TokenType";
import { Diagnostics, Severity } from "../diagnostics/Diagnostics";

const DOUBLE_CHAR_TOKENS: Record<string, TokenType> = {
    "->": TokenType.Arrow,
    ">=": TokenType.GtEquals,
    "<=": TokenType.LtEquals,
    "!=": TokenType.NotEquals,
    "==": TokenType.EqualsEquals,
};

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
    "(": TokenType.LeftParen,
    ")": TokenType.RightParen,
    "{": TokenType.LeftBrace,
    "}": TokenType.RightBrace,
    ":": TokenType.Colon,
    "=": TokenType.Equals,
    "&": TokenType.Ampersand,
    "%": TokenType.Percent,
    "+": TokenType.Plus,
    "-": TokenType.Minus,
    ">": TokenType.Gt,
    "<": TokenType.Lt,
};

/**
 * Streaming scanner over a template source.
 *
 * Tokens are produced on demand: `lex()` advances `currentToken`, and `peek()`
 * looks one token past it without consuming anything. Keywords (`if`, `for`,
 * `let`, `in`) come out as plain `Ident` tokens; the parser tells them apart
 * by their lexeme.
 */
export class Lexer {
    private input: string;
    private position: number = 0;
    private line: number = 1;
    private col: number = 1;
    private diagnostics: Diagnostics;

    public currentToken: Token;
    // Filled lazily by peek(), drained by the next lex()
    private lookahead: Token | null = null;

    constructor(input: string, diagnostics: Diagnostics = new Diagnostics(input)) {
        this.input = input;
        this.diagnostics = diagnostics;
        this.currentToken = { type: TokenType.Eof, value: "", line: 1, col: 1 };
    }

    public static isOperator(type: TokenType): boolean {
        return COMPARISON_TOKENS.includes(type);
    }

    public lex(): Token {
        if (this.lookahead) {
            this.currentToken = this.lookahead;
            this.lookahead = null;
        } else {
            this.currentToken = this.scan();
        }
        return this.currentToken;
    }

    public peek(): TokenType {
        return this.peekToken().type;
    }

    public peekToken(): Token {
        if (!this.lookahead) {
            this.lookahead = this.scan();
        }
        return this.lookahead;
    }

    /**
     * Drains the remaining stream. The returned array always ends with a
     * single Eof token.
     */
    public tokenize(): Token[] {
        const tokens: Token[] = [];
        do {
            tokens.push(this.lex());
        } while (this.currentToken.type !== TokenType.Eof);
        return tokens;
    }

    private scan(): Token {
        while (this.position < this.input.length) {
            const char = this.currentChar();

            if (this.isWhitespace(char)) {
                this.advance();
                continue;
            }

            if (char === "/" && this.peekChar() === "/") {
                this.skipComment();
                continue;
            }

            const pair = this.input.slice(this.position, this.position + 2);
            const doubleType = DOUBLE_CHAR_TOKENS[pair];
            if (doubleType) {
                const token = this.createToken(doubleType, pair);
                this.advance();
                this.advance();
                return token;
            }

            const singleType = SINGLE_CHAR_TOKENS[char];
            if (singleType) {
                const token = this.createToken(singleType, char);
                this.advance();
                return token;
            }

            if (this.isAlpha(char)) {
                return this.readIdentifier();
            }

            if (this.isDigit(char)) {
                return this.readNumber();
            }

            this.diagnostics.report(
                Severity.Error,
                `Unexpected character '${char}'`,
                { line: this.line, col: this.col, len: 1 },
            );
            this.advance();
        }

        return this.createToken(TokenType.Eof, "");
    }

    private createToken(type: TokenType, value: string): Token {
        return { type, value, line: this.line, col: this.col };
    }

    private advance() {
        if (this.currentChar() === "\n") {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        this.position++;
    }

    private currentChar(): string {
        return this.input[this.position];
    }

    private peekChar(offset = 1): string {
        if (this.position + offset >= this.input.length) return "";
        return this.input[this.position + offset];
    }

    private isWhitespace(char: string): boolean {
        return /\s/.test(char);
    }

    private isAlpha(char: string): boolean {
        return /[a-zA-Z_]/.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /[a-zA-Z0-9_]/.test(char);
    }

    private isDigit(char: string): boolean {
        return /[0-9]/.test(char);
    }

    private readNumber(): Token {
        const startLine = this.line;
        const startCol = this.col;
        let value = "";

        while (
            this.position < this.input.length &&
            this.isDigit(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        if (this.currentChar() === "." && this.isDigit(this.peekChar())) {
            value += ".";
            this.advance();

            while (
                this.position < this.input.length &&
                this.isDigit(this.currentChar())
            ) {
                value += this.currentChar();
                this.advance();
            }
        }

        return {
            type: TokenType.Number,
            value,
            line: startLine,
            col: startCol,
        };
    }

    private readIdentifier(): Token {
        const startLine = this.line;
        const startCol = this.col;
        let value = "";

        while (
            this.position < this.input.length &&
            this.isAlphaNumeric(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        return { type: TokenType.Ident, value, line: startLine, col: startCol };
    }

    private skipComment() {
        while (
            this.position < this.input.length &&
            this.currentChar() !== "\n"
        ) {
            this.advance();
        }
    }
}
