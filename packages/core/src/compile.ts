import { Parser } from "./parser/Parser";
import { AstNode } from "./parser/types";
import { SymbolTable } from "./symbols/SymbolTable";
import { Diagnostics } from "./diagnostics/Diagnostics";
import { FatalCompileError } from "./utils/err";

export interface CompileOptions {
    /** Externally supplied variables, seeded as global symbols. */
    variables?: Record<string, string>;
}

/** A parse with no errors; the only shape a generator accepts. */
export interface CompiledTemplate {
    status: "ok";
    template: AstNode;
    symbols: SymbolTable;
    diagnostics: Diagnostics;
}

/** Parsed to the end, but with errors; the tree is best-effort. */
export interface InvalidTemplate {
    status: "invalid";
    template: AstNode;
    symbols: SymbolTable;
    diagnostics: Diagnostics;
}

export interface AbortedCompile {
    status: "aborted";
    error: FatalCompileError;
    diagnostics: Diagnostics;
}

export type CompileResult = CompiledTemplate | InvalidTemplate | AbortedCompile;

export interface TemplateGenerator<TOutput = string> {
    generate(compiled: CompiledTemplate): TOutput;
}

export function compileTemplate(
    source: string,
    options: CompileOptions = {},
): CompileResult {
    const symbols = options.variables
        ? SymbolTable.fromExternalMapping(options.variables)
        : new SymbolTable();
    const parser = new Parser(source, symbols);

    try {
        parser.parse();
    } catch (e) {
        if (e instanceof FatalCompileError) {
            return {
                status: "aborted",
                error: e,
                diagnostics: parser.diagnostics,
            };
        }
        throw e;
    }

    const parsed = {
        template: parser.root,
        symbols: parser.symbols,
        diagnostics: parser.diagnostics,
    };
    if (parser.diagnostics.isErr()) {
        return { status: "invalid", ...parsed };
    }
    return { status: "ok", ...parsed };
}
