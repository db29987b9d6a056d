export { Lexer } from "./lexer/Lexer";
export type { Token } from "./lexer/Token";
export { TokenType, COMPARISON_TOKENS } from "./lexer/TokenType";
export { Parser } from "./parser/Parser";
export * from "./parser/types";
export * from "./symbols/SymbolTable";
export * from "./diagnostics/Diagnostics";
export * from "./compile";
export * from "./utils/ASTUtils";
export { FatalCompileError, formatMessage } from "./utils/err";
export type { ErrorLocation } from "./utils/err";
