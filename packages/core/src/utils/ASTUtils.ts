import { AstKind, AstNode, isComparison } from "../parser/types";

const OPERATOR_TEXT: Partial<Record<AstKind, string>> = {
    [AstKind.Plus]: "+",
    [AstKind.Minus]: "-",
    [AstKind.Gt]: ">",
    [AstKind.Lt]: "<",
    [AstKind.GtEquals]: ">=",
    [AstKind.LtEquals]: "<=",
    [AstKind.NotEquals]: "!=",
    [AstKind.EqualsEquals]: "==",
};

/**
 * Depth-first, pre-order traversal. Returning `false` from `visit` skips the
 * node's children.
 */
export function walk(
    node: AstNode,
    visit: (node: AstNode, depth: number) => boolean | void,
    depth: number = 0,
): void {
    if (visit(node, depth) === false) return;
    for (const child of node.children) {
        walk(child, visit, depth + 1);
    }
}

export function findIncludes(root: AstNode): string[] {
    const includes: string[] = [];
    walk(root, (node) => {
        if (node.kind === AstKind.Include) includes.push(node.value);
    });
    return includes;
}

export function findVariableReferences(root: AstNode): AstNode[] {
    const refs: AstNode[] = [];
    walk(root, (node) => {
        if (node.kind === AstKind.VariableValue) refs.push(node);
    });
    return refs;
}

/**
 * Names used as `%name%` that the given table cannot resolve, each reported
 * once in order of first use.
 */
export function findUnresolvedVariables(
    root: AstNode,
    symbols: { has(name: string): boolean },
): string[] {
    const missing = new Set<string>();
    for (const ref of findVariableReferences(root)) {
        if (!symbols.has(ref.value)) missing.add(ref.value);
    }
    return Array.from(missing);
}

export function renderExpression(node: AstNode): string {
    const operator = OPERATOR_TEXT[node.kind];
    if (operator === undefined || node.children.length < 2) {
        return node.value;
    }

    const [left, right] = node.children;
    const leftText = isComparison(left)
        ? `(${renderExpression(left)})`
        : renderExpression(left);
    const rightText =
        OPERATOR_TEXT[right.kind] !== undefined && right.children.length >= 2
            ? `(${renderExpression(right)})`
            : renderExpression(right);

    return `${leftText} ${operator} ${rightText}`;
}

export function printTree(root: AstNode): string {
    const lines: string[] = [];
    walk(root, (node, depth) => {
        let line = `${"  ".repeat(depth)}${node.kind}`;
        if (node.value) line += ` "${node.value}"`;
        if (node.varType) line += ` : ${node.varType}`;
        lines.push(line);
    });
    return lines.join("\n");
}
