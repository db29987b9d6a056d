export enum TokenType {
    // Words
    Ident = "Ident",
    Number = "Number",

    // Punctuation
    LeftParen = "LeftParen", // (
    RightParen = "RightParen", // )
    LeftBrace = "LeftBrace", // {
    RightBrace = "RightBrace", // }
    Colon = "Colon", // :
    Arrow = "Arrow", // ->
    Equals = "Equals", // =
    Ampersand = "Ampersand", // &
    Percent = "Percent", // %

    // Arithmetic
    Plus = "Plus", // +
    Minus = "Minus", // -

    // Comparison
    Gt = "Gt", // >
    Lt = "Lt", // <
    GtEquals = "GtEquals", // >=
    LtEquals = "LtEquals", // <=
    NotEquals = "NotEquals", // !=
    EqualsEquals = "EqualsEquals", // ==

    Eof = "Eof",
}

export const COMPARISON_TOKENS: readonly TokenType[] = [
    TokenType.Gt,
    TokenType.Lt,
    TokenType.GtEquals,
    TokenType.LtEquals,
    TokenType.NotEquals,
    TokenType.EqualsEquals,
];
