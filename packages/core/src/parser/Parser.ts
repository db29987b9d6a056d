import { Lexer } from "../lexer/Lexer";
import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { Diagnostics } from "../diagnostics/Diagnostics";
import { SymbolTable } from "../symbols/SymbolTable";
import { AstKind, AstNode, createNode, isComparison } from "./types";

const KEYWORD_IF = "if";
const KEYWORD_FOR = "for";
const KEYWORD_LET = "let";
const KEYWORD_IN = "in";

const ELEMENT_KEYWORDS: readonly string[] = [
    KEYWORD_IF,
    KEYWORD_FOR,
    KEYWORD_LET,
];

const COMPARISON_NODES: Partial<Record<TokenType, AstKind>> = {
    [TokenType.Gt]: AstKind.Gt,
    [TokenType.Lt]: AstKind.Lt,
    [TokenType.GtEquals]: AstKind.GtEquals,
    [TokenType.LtEquals]: AstKind.LtEquals,
    [TokenType.NotEquals]: AstKind.NotEquals,
    [TokenType.EqualsEquals]: AstKind.EqualsEquals,
};

/**
 * Recursive-descent parser for templates.
 *
 * Syntax problems are recorded in `diagnostics` and parsing carries on, so the
 * tree is only trustworthy when `diagnostics.isErr()` is false. Problems with
 * declarations (redeclared names, missing type labels) surface as a thrown
 * `FatalCompileError` from the symbol table.
 */
export class Parser {
    private lexer: Lexer;
    private current: Token;
    private parsed: boolean = false;

    public readonly root: AstNode;
    public readonly symbols: SymbolTable;
    public readonly diagnostics: Diagnostics;

    constructor(source: string, symbols: SymbolTable = new SymbolTable()) {
        this.diagnostics = new Diagnostics(source);
        this.symbols = symbols;
        this.lexer = new Lexer(source, this.diagnostics);
        this.current = this.lexer.lex();
        this.root = createNode(AstKind.Template, "", { line: 1, col: 1 });
    }

    public parse(): AstNode {
        if (this.parsed) return this.root;
        this.parsed = true;

        if (this.current.type === TokenType.Eof) {
            this.diagnostics.newErr("End of input reached, nothing to parse!");
            this.root.children.push(createNode(AstKind.Eof, "", this.current));
            return this.root;
        }

        this.root.children.push(...this.sequence(false));
        return this.root;
    }

    // Element* up to end of input, or up to the closing brace of a block.
    private sequence(inBlock: boolean): AstNode[] {
        const elements: AstNode[] = [];

        while (this.current.type !== TokenType.Eof) {
            if (inBlock && this.current.type === TokenType.RightBrace) {
                return elements;
            }
            const element = this.element();
            if (element.kind !== AstKind.Empty) elements.push(element);
        }

        if (inBlock) elements.push(createNode(AstKind.Eof, "", this.current));
        return elements;
    }

    private block(): AstNode[] {
        this.expect(TokenType.LeftBrace);
        const body = this.sequence(true);
        this.expect(TokenType.RightBrace);
        return body;
    }

    private element(): AstNode {
        const token = this.current;

        switch (token.type) {
            case TokenType.Ident:
                if (token.value === KEYWORD_IF) return this.ifExpr();
                if (token.value === KEYWORD_FOR) return this.forExpr();
                if (token.value === KEYWORD_LET) return this.letExpr();
                return this.declaration();
            case TokenType.LeftBrace: {
                const group = createNode(AstKind.Element, "", token);
                group.children.push(...this.block());
                return group;
            }
            case TokenType.Ampersand:
                return this.include();
            case TokenType.Eof:
                return createNode(AstKind.Eof, "", token);
            default:
                this.diagnostics.parseErr(
                    `Unexpected token '${token.value}'`,
                    token,
                );
                this.advance();
                return createNode(AstKind.Empty, "", token);
        }
    }

    private ifExpr(): AstNode {
        const keyword = this.current;
        this.advance();

        const node = createNode(AstKind.IfExpr, "", keyword);
        const condition = this.expr();
        if (!isComparison(condition)) {
            this.diagnostics.parseErr(
                "Expected a comparison after 'if'",
                keyword,
            );
        }

        node.children.push(condition, ...this.block());
        return node;
    }

    private forExpr(): AstNode {
        const keyword = this.current;
        this.advance();

        const node = createNode(AstKind.ForExpr, "", keyword);
        const variable = this.term();

        this.expect(TokenType.Colon);
        if (
            this.current.type === TokenType.Ident &&
            this.current.value !== KEYWORD_IN
        ) {
            variable.varType = this.current.value;
            this.advance();
        }

        // Registered before the body so references inside it resolve.
        if (variable.kind === AstKind.Ident) {
            this.symbols.insertForId(variable);
        } else {
            this.diagnostics.parseErr(
                "Expected a loop variable name after 'for'",
                keyword,
            );
        }

        if (
            this.current.type === TokenType.Ident &&
            this.current.value === KEYWORD_IN
        ) {
            this.advance();
        } else {
            this.diagnostics.parseErr("Expected 'in' in for loop", this.current);
        }

        const collectionToken = this.current;
        const collection = this.term();
        if (collection.kind === AstKind.Ident) {
            if (!this.symbols.has(collection.value)) {
                this.diagnostics.newWarning(
                    `Collection '${collection.value}' is not declared before this loop`,
                    collectionToken,
                );
            }
        } else if (
            collection.kind !== AstKind.Empty &&
            collection.kind !== AstKind.Eof
        ) {
            this.diagnostics.parseErr(
                "Expected a collection name after 'in'",
                collectionToken,
            );
        }

        node.children.push(variable, collection, ...this.block());
        return node;
    }

    private letExpr(): AstNode {
        this.advance();
        const assignment = this.expr();

        // Visible to everything parsed after this point, never before.
        this.symbols.insert(assignment);
        return assignment;
    }

    private declaration(): AstNode {
        const element = createNode(AstKind.Element, "", this.current);
        element.children.push(this.term());

        if (this.current.type === TokenType.LeftParen) {
            element.children.push(this.attrList());
        }

        element.children.push(...this.elementBody());
        return element;
    }

    // Either a nested element, a braced block of elements, or plain contents.
    private elementBody(): AstNode[] {
        const token = this.current;

        if (token.type === TokenType.LeftBrace) return this.block();
        if (token.type === TokenType.Ampersand) return [this.include()];
        if (
            token.type === TokenType.Ident &&
            (this.lexer.peek() === TokenType.LeftParen ||
                ELEMENT_KEYWORDS.includes(token.value))
        ) {
            return [this.element()];
        }
        return [this.contents()];
    }

    private attrList(): AstNode {
        const node = createNode(AstKind.AttrList, "", this.current);
        this.expect(TokenType.LeftParen);

        const errorsBefore = this.diagnostics.errorCount;
        while (
            this.current.type !== TokenType.RightParen &&
            this.current.type !== TokenType.Eof
        ) {
            node.children.push(this.term());
            this.expect(TokenType.Colon);
            node.children.push(this.term());

            if (this.diagnostics.errorCount > errorsBefore) break;
        }

        this.expect(TokenType.RightParen);
        this.expect(TokenType.Arrow);
        return node;
    }

    private contents(): AstNode {
        const node = createNode(AstKind.Contents, "", this.current);

        if (this.current.type === TokenType.Arrow) {
            this.diagnostics.parseErr(
                `Unexpected token '${this.current.value}'`,
                this.current,
            );
            this.advance();
        }

        while (
            this.current.type === TokenType.Ident ||
            this.current.type === TokenType.Percent
        ) {
            if (this.current.type === TokenType.Percent) {
                node.children.push(this.variableValue());
                continue;
            }
            // The next element declaration starts here.
            if (this.lexer.peek() === TokenType.LeftParen) break;

            node.children.push(
                createNode(AstKind.Ident, this.current.value, this.current),
            );
            this.advance();
        }

        return node;
    }

    private variableValue(): AstNode {
        const open = this.current;
        this.advance();

        const name = this.current;
        const node = createNode(
            AstKind.VariableValue,
            name.type === TokenType.Ident ? name.value : "",
            open,
        );
        this.expect(TokenType.Ident);
        this.expect(TokenType.Percent);
        return node;
    }

    private include(): AstNode {
        const ampersand = this.current;
        this.advance();

        const name = this.current;
        const node = createNode(
            AstKind.Include,
            name.type === TokenType.Ident ? name.value : "",
            ampersand,
        );
        this.expect(TokenType.Ident);
        return node;
    }

    private expr(): AstNode {
        const left = this.op();
        const token = this.current;

        const comparison = COMPARISON_NODES[token.type];
        if (comparison !== undefined) {
            this.advance();
            const node = createNode(comparison, token.value, token);
            node.children.push(left, this.op());

            if (Lexer.isOperator(this.current.type)) {
                this.diagnostics.parseErr(
                    "Comparisons cannot be chained",
                    this.current,
                );
            }
            return node;
        }

        if (token.type === TokenType.Colon) {
            this.advance();
            if (this.current.type === TokenType.Ident) {
                left.varType = this.current.value;
                this.advance();
            }
            this.expect(TokenType.Equals);
            return this.assignment(left, token);
        }

        if (token.type === TokenType.Equals) {
            this.advance();
            return this.assignment(left, token);
        }

        return left;
    }

    private assignment(target: AstNode, token: Token): AstNode {
        const node = createNode(AstKind.AssignExpr, "", target.loc ?? token);
        node.varType = target.varType;
        node.children.push(target, this.op());
        return node;
    }

    private op(): AstNode {
        let left = this.term();

        while (
            this.current.type === TokenType.Plus ||
            this.current.type === TokenType.Minus
        ) {
            const token = this.current;
            const kind =
                token.type === TokenType.Plus ? AstKind.Plus : AstKind.Minus;
            this.advance();

            const node = createNode(kind, token.value, token);
            node.children.push(left, this.term());
            left = node;
        }

        return left;
    }

    private term(): AstNode {
        const token = this.current;

        switch (token.type) {
            case TokenType.Ident: {
                const kind =
                    this.lexer.peek() === TokenType.LeftParen
                        ? AstKind.ElementName
                        : AstKind.Ident;
                this.advance();
                return createNode(kind, token.value, token);
            }
            case TokenType.Number:
                this.advance();
                return createNode(AstKind.Number, token.value, token);
            case TokenType.LeftParen: {
                this.advance();
                const inner = this.expr();
                this.expect(TokenType.RightParen);
                return inner;
            }
            case TokenType.Eof:
                return createNode(AstKind.Eof, "", token);
            default:
                this.diagnostics.parseErr(
                    `Unexpected token '${token.value}'`,
                    token,
                );
                return createNode(AstKind.Empty, "", token);
        }
    }

    private expect(type: TokenType): boolean {
        if (this.current.type === type) {
            this.advance();
            return true;
        }

        this.diagnostics.parseErr(
            `Expected ${type}, found ${this.current.type}`,
            this.current,
        );
        return false;
    }

    private advance(): void {
        this.current = this.lexer.lex();
    }
}
