import { randomUUID } from "crypto";
import { addDays, formatISO } from "date-fns";
import { injectable } from "tsyringe";
import config from "../../config/config";
import { CouponModel } from "../models/CouponModel";

const FREE_MEAL_PERCENT = 100;

@injectable()
export class CouponService {
    public createFreeCoupon(daysValid: number = config.couponDaysValid, issuedAt: Date = new Date()): CouponModel {
        if (!Number.isInteger(daysValid) || daysValid <= 0) {
            throw new Error("Coupon validity must be a positive number of days.");
        }

        const code = `MEAL-${randomUUID().replace(/-/g, "").slice(0, 8).toUpperCase()}`;
        const expires = formatISO(addDays(issuedAt, daysValid), { representation: "date" });
        return new CouponModel(code, expires, FREE_MEAL_PERCENT);
    }
}
