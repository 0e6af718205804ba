export class RefundModel {
    constructor(
        public readonly orderAmount: number,
        public readonly refundPercent: number,
        public readonly refundAmount: number
    ) {}

    toJSON() {
        return {
            orderAmount: this.orderAmount,
            refundPercent: this.refundPercent,
            refundAmount: this.refundAmount,
        };
    }
}
