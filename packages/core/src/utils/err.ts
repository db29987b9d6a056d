import chalk from "chalk";

export interface ErrorLocation {
    line: number;
    col: number;
    len?: number;
}

export enum Severity {
    Error = "Error",
    Warning = "Warning",
}

/**
 * Renders a message as a block pointing at a location in the source.
 *
 * Error: Expected RightParen, found Arrow
 *   --> line 1:17
 *    |
 *  1 | div(class: name -> hello
 *    |                 ^^
 *    |
 */
export function formatMessage(
    level: Severity,
    message: string,
    loc?: ErrorLocation,
    source?: string,
): string {
    const label = level === Severity.Error ? chalk.red.bold : chalk.yellow.bold;
    const header = `${label(`${level}:`)} ${chalk.bold(message)}`;

    if (!loc) return header;

    const lineNumStr = String(loc.line);
    const padding = " ".repeat(lineNumStr.length);
    const locationLine = `${chalk.blue(padding)} ${chalk.blue("-->")} line ${loc.line}:${loc.col}`;

    if (source === undefined) return [header, locationLine].join("\n");

    const lineContent = source.split("\n")[loc.line - 1] ?? "";
    const pipeLine = `${chalk.blue(padding)} ${chalk.blue("|")}`;
    const codeLine = `${chalk.blue(lineNumStr)} ${chalk.blue("|")} ${lineContent}`;

    const pointerSpace = " ".repeat(Math.max(0, loc.col - 1));
    const underlineLen = Math.max(1, loc.len ?? 1);
    const pointer = label("^".repeat(underlineLen));
    const pointerLine = `${chalk.blue(padding)} ${chalk.blue("|")} ${pointerSpace}${pointer}`;

    return [header, locationLine, pipeLine, codeLine, pointerLine, pipeLine].join(
        "\n",
    );
}

/**
 * Internal-consistency failure that ends a compile outright: redeclared
 * symbols, declarations without a type label, malformed declaration nodes.
 * Unlike syntax problems these are never collected as diagnostics.
 */
export class FatalCompileError extends Error {
    public rawMessage: string;
    public loc?: ErrorLocation;

    constructor(message: string, loc?: ErrorLocation) {
        super(loc ? `${message} (line ${loc.line}:${loc.col})` : message);
        this.name = "FatalCompileError";
        this.rawMessage = message;
        this.loc = loc;
    }

    public format(source?: string): string {
        return formatMessage(Severity.Error, this.rawMessage, this.loc, source);
    }
}
