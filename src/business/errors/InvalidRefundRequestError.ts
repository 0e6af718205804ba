export class InvalidRefundRequestError extends Error {
    constructor(
        message = "Refund amount must be a positive number.",
        public readonly statusCode: number = 400
    ) {
        super(message);
        this.name = "InvalidRefundRequestError";
    }
}
