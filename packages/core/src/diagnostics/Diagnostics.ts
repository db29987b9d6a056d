import { Token } from "../lexer/Token";
import { ErrorLocation, formatMessage, Severity } from "../utils/err";

export { Severity };

export interface Diagnostic {
    severity: Severity;
    message: string;
    loc?: ErrorLocation;
    token?: Token;
}

/**
 * Append-only record of the problems found during a parse.
 *
 * Recording a message never throws, so the parser can keep consuming tokens
 * after a syntax error and report everything it finds in a single pass.
 * Generation must not run while `isErr()` is true.
 */
export class Diagnostics {
    private source?: string;
    private entries: Diagnostic[] = [];

    constructor(source?: string) {
        this.source = source;
    }

    public get messages(): readonly Diagnostic[] {
        return this.entries;
    }

    public get errorCount(): number {
        return this.entries.filter((d) => d.severity === Severity.Error).length;
    }

    public get warningCount(): number {
        return this.entries.filter((d) => d.severity === Severity.Warning)
            .length;
    }

    public report(
        severity: Severity,
        message: string,
        loc?: ErrorLocation,
        token?: Token,
    ): void {
        this.entries.push({ severity, message, loc, token });
    }

    public newErr(message: string): void {
        this.report(Severity.Error, message);
    }

    public parseErr(message: string, token: Token): void {
        this.report(Severity.Error, message, tokenLoc(token), token);
    }

    public newWarning(message: string, token?: Token): void {
        this.report(
            Severity.Warning,
            message,
            token ? tokenLoc(token) : undefined,
            token,
        );
    }

    public isErr(): boolean {
        return this.entries.some((d) => d.severity === Severity.Error);
    }

    public hasMessages(): boolean {
        return this.entries.length > 0;
    }

    public format(): string {
        return this.entries
            .map((d) => formatMessage(d.severity, d.message, d.loc, this.source))
            .join("\n\n");
    }

    public printMessages(write: (text: string) => void = console.error): void {
        if (!this.hasMessages()) return;
        write(this.format());
    }
}

function tokenLoc(token: Token): ErrorLocation {
    return {
        line: token.line,
        col: token.col,
        len: Math.max(1, token.value.length),
    };
}
