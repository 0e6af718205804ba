export class ParseError extends Error {
    public readonly code = "FAQ_PARSE_ERROR";
    public readonly source: string;
    public readonly issues: string[];

    constructor(source: string, issues: string[]) {
        super(`Failed to load FAQ corpus from ${source}: ${issues[0] ?? "unknown error"}`);
        this.name = "ParseError";
        this.source = source;
        this.issues = issues.length > 0 ? issues : ["unknown error"];
    }
}
