/** Generation strategies a declaration can be classified into. */
export enum VariantKind {
    Immutable = "immutable",
    JsonCodec = "json",
    Provider = "provider",
}

/** The two companion files a source can receive. */
export enum CompanionKind {
    Freezed = "freezed",
    Generated = "g",
}
