import { AstKind, AstNode } from "../parser/types";
import { FatalCompileError } from "../utils/err";
import { renderExpression } from "../utils/ASTUtils";

export enum SymbolScope {
    Global = "global",
    ForLocal = "for",
}

export interface TemplateSymbol {
    readonly name: string;
    readonly type: string;
    readonly value: string;
    readonly scope: SymbolScope;
}

/** Type label given to variables that come from outside the template. */
export const EXTERNAL_SYMBOL_TYPE = "String";

/**
 * Declarations made while parsing one template.
 *
 * The namespace is flat: a for-loop variable and a `let` binding live side by
 * side, so a loop variable keeps its name reserved for the rest of the
 * template. Every structural problem with a declaration is fatal. Entries are
 * frozen once defined and never reassigned.
 */
export class SymbolTable implements Iterable<TemplateSymbol> {
    private table: Map<string, TemplateSymbol> = new Map();

    /**
     * Seeds global symbols from an externally supplied name → value
     * mapping, typically a flat JSON object of strings.
     */
    public static fromExternalMapping(
        mapping: Record<string, string>,
    ): SymbolTable {
        const symbols = new SymbolTable();

        for (const [name, value] of Object.entries(mapping)) {
            symbols.define({
                name,
                type: EXTERNAL_SYMBOL_TYPE,
                value,
                scope: SymbolScope.Global,
            });
        }
        return symbols;
    }

    public insert(node: AstNode): this {
        if (node.kind !== AstKind.AssignExpr) {
            throw new FatalCompileError(
                `Invalid node kind '${node.kind}' passed to symbol table`,
                node.loc,
            );
        }
        if (node.children.length < 2) {
            throw new FatalCompileError(
                "Assignment passed to symbol table is missing its name or value",
                node.loc,
            );
        }

        const [ident, value] = node.children;
        const type = this.requireDeclaration(ident);

        this.define({
            name: ident.value,
            type,
            value: renderExpression(value),
            scope: SymbolScope.Global,
        });
        return this;
    }

    public insertForId(node: AstNode): this {
        if (node.kind !== AstKind.Ident) {
            throw new FatalCompileError(
                `Invalid node kind '${node.kind}' used as a loop variable`,
                node.loc,
            );
        }

        const type = this.requireDeclaration(node);

        this.define({
            name: node.value,
            type,
            value: node.value,
            scope: SymbolScope.ForLocal,
        });
        return this;
    }

    public get(name: string): TemplateSymbol | undefined {
        return this.table.get(name);
    }

    public has(name: string): boolean {
        return this.table.has(name);
    }

    public get size(): number {
        return this.table.size;
    }

    public [Symbol.iterator](): Iterator<TemplateSymbol> {
        return this.table.values();
    }

    private define(symbol: TemplateSymbol): void {
        this.table.set(symbol.name, Object.freeze(symbol));
    }

    private requireDeclaration(ident: AstNode): string {
        if (ident.kind !== AstKind.Ident) {
            throw new FatalCompileError(
                `Expected an identifier to declare, found '${ident.kind}'`,
                ident.loc,
            );
        }
        if (ident.varType === undefined) {
            throw new FatalCompileError(
                `Variable '${ident.value}' declared without a type`,
                ident.loc,
            );
        }
        if (this.table.has(ident.value)) {
            throw new FatalCompileError(
                `Redeclared symbol '${ident.value}'`,
                ident.loc,
            );
        }
        return ident.varType;
    }
}
