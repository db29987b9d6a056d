export enum AstKind {
    Template = "Template",
    Element = "Element",
    ElementName = "ElementName",
    IfExpr = "IfExpr",
    ForExpr = "ForExpr",
    AssignExpr = "AssignExpr",
    AttrList = "AttrList",
    Ident = "Ident",
    Number = "Number",
    Contents = "Contents",
    VariableValue = "VariableValue",
    Include = "Include",

    // Arithmetic
    Plus = "Plus",
    Minus = "Minus",

    // Comparison
    Gt = "Gt",
    Lt = "Lt",
    GtEquals = "GtEquals",
    LtEquals = "LtEquals",
    NotEquals = "NotEquals",
    EqualsEquals = "EqualsEquals",

    Eof = "Eof",
    Empty = "Empty",
}

export interface SourceLocation {
    line: number;
    col: number;
}

/**
 * Every node shares one shape; what `value` holds depends on `kind`
 * (the tag name for ElementName, the file for Include, the lexeme for
 * Ident/Number, empty for structural kinds).
 */
export interface AstNode {
    readonly kind: AstKind;
    value: string;
    children: AstNode[];
    varType?: string;
    loc?: SourceLocation;
}

export function createNode(
    kind: AstKind,
    value: string = "",
    loc?: SourceLocation,
): AstNode {
    const node: AstNode = { kind, value, children: [] };
    if (loc) node.loc = { line: loc.line, col: loc.col };
    return node;
}

export const COMPARISON_KINDS: readonly AstKind[] = [
    AstKind.Gt,
    AstKind.Lt,
    AstKind.GtEquals,
    AstKind.LtEquals,
    AstKind.NotEquals,
    AstKind.EqualsEquals,
];

export function isComparison(node: AstNode): boolean {
    return COMPARISON_KINDS.includes(node.kind);
}
