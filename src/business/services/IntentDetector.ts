import { injectable } from "tsyringe";
import intentKeywords from "../resources/intent-keywords.json";
import { Tokenizer } from "../../utils/tokenizer";

export type Intent = "FAQ" | "REVIEW";

const RATING_PATTERN = /\b[1-5]\s*\/\s*5\b|\b[1-5]\s*stars?\b/i;
const LONG_MESSAGE_WORDS = 6;

/**
 * Keyword heuristic that tells a guest question apart from a restaurant review.
 */
@injectable()
export class IntentDetector {
    private readonly tokenizer = new Tokenizer({ stopWords: null });
    private readonly reviewKeywords: ReadonlySet<string> = new Set(intentKeywords.review);
    private readonly opinionKeywords: ReadonlySet<string> = new Set(intentKeywords.opinion);

    public detect(text: string): Intent {
        const trimmed = text.trim();
        if (!trimmed) return "FAQ";

        if (RATING_PATTERN.test(trimmed) || trimmed.includes("⭐")) return "REVIEW";

        const tokens = this.tokenizer.tokenize(trimmed);
        const reviewHit = tokens.some((token) => this.reviewKeywords.has(token));
        const opinionHit = tokens.some((token) => this.opinionKeywords.has(token));
        const longish = trimmed.split(/\s+/).length >= LONG_MESSAGE_WORDS;

        return reviewHit && (opinionHit || longish) ? "REVIEW" : "FAQ";
    }
}
