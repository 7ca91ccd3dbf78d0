/** Immutability wrapping and equality strategy of a type. */
export enum CollectionKind {
    None = "none",
    List = "list",
    Map = "map",
    Set = "set",
}

export enum DeclarationKind {
    ValueType = "value-type",
    PlainFunction = "plain-function",
    StatefulUnit = "stateful-unit",
}

/** Which provider class a riverpod declaration becomes, from its return type. */
export enum ProviderFlavor {
    Plain = "plain",
    Future = "future",
    Stream = "stream",
}

/** What happened to a path, as reported by the change stream. */
export enum ChangeKind {
    Created = "created",
    Modified = "modified",
    Deleted = "deleted",
    ConfigChanged = "config-changed",
}
