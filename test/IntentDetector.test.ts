import { IntentDetector } from "../src/business/services/IntentDetector";

describe("IntentDetector", () => {
  const detector = new IntentDetector();

  it.each([
    ["", "FAQ"],
    ["What time is check-in?", "FAQ"],
    ["Can I book breakfast?", "FAQ"],
    ["The pizza was delicious", "REVIEW"],
    ["Dinner tonight 4/5", "REVIEW"],
    ["3 stars", "REVIEW"],
    ["⭐⭐⭐", "REVIEW"],
    ["We had the pasta at the restaurant last night", "REVIEW"],
  ])("classifies %p as %s", (text, intent) => {
    expect(detector.detect(text)).toBe(intent);
  });
});
