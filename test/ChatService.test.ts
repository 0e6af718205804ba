import { ChatService } from "../src/business/services/ChatService";
import { FaqRetrievalService } from "../src/business/services/FaqRetrievalService";
import { SentimentService } from "../src/business/services/SentimentService";
import { IntentDetector } from "../src/business/services/IntentDetector";
import { RestaurantActionPolicy } from "../src/business/services/RestaurantActionPolicy";
import { CouponService } from "../src/business/services/CouponService";
import { CouponModel } from "../src/business/models/CouponModel";
import { FaqEntryModel } from "../src/business/models/FaqEntryModel";
import { QueryResultModel } from "../src/business/models/QueryResultModel";

describe("ChatService", () => {
  const faqResult = new QueryResultModel(
    new FaqEntryModel("Are pets allowed?", "Small dogs are welcome."),
    0,
    0.8,
    "Small dogs are welcome.",
    "matched"
  );
  const coupon = new CouponModel("MEAL-ABCD1234", "2024-02-14", 100);

  let ask: jest.Mock;
  let predict: jest.Mock;
  let createFreeCoupon: jest.Mock;
  let service: ChatService;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    ask = jest.fn().mockResolvedValue(faqResult);
    predict = jest.fn();
    createFreeCoupon = jest.fn().mockReturnValue(coupon);

    service = new ChatService(
      { ask } as unknown as FaqRetrievalService,
      { predict } as unknown as SentimentService,
      new IntentDetector(),
      new RestaurantActionPolicy(),
      { createFreeCoupon } as unknown as CouponService
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("routes a guest question to FAQ retrieval", async () => {
    const reply = await service.handle("Can I bring my dog?");

    expect(reply).toEqual({ intent: "FAQ", result: faqResult });
    expect(ask).toHaveBeenCalledWith("Can I bring my dog?", undefined);
    expect(predict).not.toHaveBeenCalled();
  });

  it("passes an explicit threshold through", async () => {
    await service.handle("Can I bring my dog?", "faq", 0.5);
    expect(ask).toHaveBeenCalledWith("Can I bring my dog?", 0.5);
  });

  it("issues a coupon for a positive review", async () => {
    predict.mockResolvedValue({ label: "Positive", confidence: 0.95 });

    const reply = await service.handle("The pizza was delicious");

    expect(reply).toEqual({
      intent: "REVIEW",
      prediction: { label: "Positive", confidence: 0.95 },
      action: "COUPON_FREE",
      message: "Positive (0.95). Thanks for the kind words! Enjoy a free meal on us.",
      coupon,
    });
    expect(ask).not.toHaveBeenCalled();
  });

  it("offers a refund without a coupon for a negative review", async () => {
    predict.mockResolvedValue({ label: "Negative", confidence: 0.88 });

    const reply = await service.handle("Room service was slow", "review");

    expect(reply.intent).toBe("REVIEW");
    if (reply.intent === "REVIEW") {
      expect(reply.action).toBe("REFUND");
      expect(reply.coupon).toBeNull();
    }
    expect(createFreeCoupon).not.toHaveBeenCalled();
  });

  it("propagates sentiment failures", async () => {
    predict.mockRejectedValue(new Error("model missing"));
    await expect(service.handle("bland soup", "review")).rejects.toThrow("model missing");
  });
});
