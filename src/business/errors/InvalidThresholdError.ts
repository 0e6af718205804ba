export class InvalidThresholdError extends Error {
    constructor(
        public readonly threshold: number,
        public readonly statusCode: number = 400
    ) {
        super(`Similarity threshold must be between 0 and 1, received ${threshold}.`);
        this.name = "InvalidThresholdError";
    }
}
