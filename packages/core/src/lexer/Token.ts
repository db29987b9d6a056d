import { TokenType } from "./TokenType";

export interface Token {
    readonly type: TokenType;
    readonly value: string;
    readonly line: number;
    readonly col: number;
}
