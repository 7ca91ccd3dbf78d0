export enum ErrorCode {
    Parse = "parse",
    Extraction = "extraction",
    Conflict = "conflict",
    UnsupportedType = "unsupported-type",
    Write = "write",
    Config = "config",
    Watch = "watch",
    Lifecycle = "lifecycle",
}
