import {
    EXTERNAL_SYMBOL_TYPE,
    SymbolScope,
    SymbolTable,
} from "../src/symbols/SymbolTable";
import { AstKind, AstNode, createNode } from "../src/parser/types";
import { FatalCompileError } from "../src/utils/err";

function ident(name: string, varType?: string): AstNode {
    const node = createNode(AstKind.Ident, name, { line: 1, col: 5 });
    if (varType) node.varType = varType;
    return node;
}

function assign(target: AstNode, value: AstNode): AstNode {
    const node = createNode(AstKind.AssignExpr);
    node.children.push(target, value);
    return node;
}

describe("SymbolTable", () => {
    test("insert a global symbol from an assignment", () => {
        const table = new SymbolTable();
        table.insert(assign(ident("x", "Int"), createNode(AstKind.Number, "10")));

        expect(table.get("x")).toEqual({
            name: "x",
            type: "Int",
            value: "10",
            scope: SymbolScope.Global,
        });
        expect(table.size).toBe(1);
    });

    test("insert a loop variable", () => {
        const table = new SymbolTable();
        table.insertForId(ident("item", "String"));

        expect(table.get("item")).toEqual({
            name: "item",
            type: "String",
            value: "item",
            scope: SymbolScope.ForLocal,
        });
    });

    test("keep defined symbols unchanged", () => {
        const table = new SymbolTable();
        table.insert(assign(ident("x", "Int"), createNode(AstKind.Number, "1")));

        const symbol = table.get("x");
        expect(Object.isFrozen(symbol)).toBe(true);
        if (symbol) {
            expect(Reflect.set(symbol, "name", "y")).toBe(false);
            expect(Reflect.set(symbol, "scope", SymbolScope.ForLocal)).toBe(false);
        }

        for (const entry of table) {
            expect(Reflect.set(entry, "value", "2")).toBe(false);
        }
        expect(table.get("x")).toEqual({
            name: "x",
            type: "Int",
            value: "1",
            scope: SymbolScope.Global,
        });
        expect(table.get("y")).toBeUndefined();
    });

    test("return undefined for unknown names", () => {
        expect(new SymbolTable().get("missing")).toBeUndefined();
    });

    test("reject nodes that are not assignments", () => {
        const table = new SymbolTable();
        expect(() => table.insert(ident("x", "Int"))).toThrow(
            "Invalid node kind 'Ident' passed to symbol table",
        );
    });

    test("reject assignments without a value", () => {
        const node = createNode(AstKind.AssignExpr);
        node.children.push(ident("x", "Int"));

        expect(() => new SymbolTable().insert(node)).toThrow(FatalCompileError);
    });

    test("reject declarations without a type", () => {
        const table = new SymbolTable();
        expect(() =>
            table.insert(assign(ident("x"), createNode(AstKind.Number, "1"))),
        ).toThrow("Variable 'x' declared without a type");
        expect(() => table.insertForId(ident("item"))).toThrow(
            "Variable 'item' declared without a type",
        );
        expect(table.size).toBe(0);
    });

    test("reject loop variables that are not identifiers", () => {
        const table = new SymbolTable();
        expect(() =>
            table.insertForId(createNode(AstKind.Number, "3")),
        ).toThrow("Invalid node kind 'Number' used as a loop variable");
    });

    test("reject redeclaration across scopes", () => {
        const table = new SymbolTable();
        table.insertForId(ident("item", "String"));

        let error: unknown;
        try {
            table.insert(
                assign(ident("item", "Int"), createNode(AstKind.Number, "1")),
            );
        } catch (e) {
            error = e;
        }

        expect(error).toBeInstanceOf(FatalCompileError);
        if (error instanceof FatalCompileError) {
            expect(error.rawMessage).toBe("Redeclared symbol 'item'");
            expect(error.loc).toEqual({ line: 1, col: 5 });
        }
        expect(table.get("item")?.scope).toBe(SymbolScope.ForLocal);
    });

    test("seed globals from an external mapping", () => {
        const table = SymbolTable.fromExternalMapping({
            title: "Home",
            author: "Sam",
        });

        expect(Array.from(table)).toEqual([
            {
                name: "title",
                type: EXTERNAL_SYMBOL_TYPE,
                value: "Home",
                scope: SymbolScope.Global,
            },
            {
                name: "author",
                type: EXTERNAL_SYMBOL_TYPE,
                value: "Sam",
                scope: SymbolScope.Global,
            },
        ]);
        expect(table.has("title")).toBe(true);
    });

    test("reject declarations that collide with seeded names", () => {
        const table = SymbolTable.fromExternalMapping({ title: "Home" });
        expect(() =>
            table.insert(
                assign(ident("title", "String"), createNode(AstKind.Ident, "x")),
            ),
        ).toThrow("Redeclared symbol 'title'");
    });
});
