export class CouponModel {
    constructor(
        public readonly code: string,
        public readonly expires: string,
        public readonly percentOff: number
    ) {}

    toJSON() {
        return {
            code: this.code,
            expires: this.expires,
            percentOff: this.percentOff,
        };
    }
}
