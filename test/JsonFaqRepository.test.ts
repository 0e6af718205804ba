import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { JsonFaqRepository } from "../src/data/repositories/JsonFaqRepository";
import { ParseError } from "../src/business/errors/ParseError";
import { VectorIndex } from "../src/business/retrieval/VectorIndex";
import { answerQuery } from "../src/business/retrieval/FaqRetriever";

describe("JsonFaqRepository", () => {
  let dir: string;
  const repository = new JsonFaqRepository();

  const writeSource = async (name: string, content: string) => {
    const file = path.join(dir, name);
    await fs.writeFile(file, content, "utf8");
    return file;
  };

  const loadError = async (source: string): Promise<ParseError> => {
    try {
      await repository.load(source);
    } catch (error) {
      if (error instanceof ParseError) return error;
      throw error;
    }
    throw new Error("expected load to fail");
  };

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "faq-repo-"));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads trimmed, frozen entries in file order", async () => {
    const file = await writeSource(
      "faq.json",
      JSON.stringify([
        { question: "  What time is check-in? ", answer: "Check-in starts at 3:00 PM." },
        { question: "Are pets allowed?", answer: " Small dogs only. " },
      ])
    );

    const corpus = await repository.load(file);

    expect(corpus.map((e) => e.toJSON())).toEqual([
      { question: "What time is check-in?", answer: "Check-in starts at 3:00 PM." },
      { question: "Are pets allowed?", answer: "Small dogs only." },
    ]);
    expect(Object.isFrozen(corpus)).toBe(true);
    expect(Object.isFrozen(corpus[0])).toBe(true);
  });

  it("accepts an empty array", async () => {
    const file = await writeSource("empty.json", "[]");
    await expect(repository.load(file)).resolves.toEqual([]);
  });

  it("tolerates a byte-order mark", async () => {
    const file = await writeSource("bom.json", "\uFEFF" + '[{"question":"Pool?","answer":"Rooftop."}]');
    const corpus = await repository.load(file);
    expect(corpus[0].answer).toBe("Rooftop.");
  });

  it("fails when the source is missing", async () => {
    const source = path.join(dir, "missing.json");
    const error = await loadError(source);

    expect(error.code).toBe("FAQ_PARSE_ERROR");
    expect(error.source).toBe(source);
    expect(error.issues[0]).toMatch(/^Unable to read FAQ source/);
  });

  it("fails on malformed JSON", async () => {
    const error = await loadError(await writeSource("broken.json", "[{"));
    expect(error.issues[0]).toMatch(/^FAQ source is not valid JSON/);
  });

  it("fails when the root is not an array", async () => {
    const error = await loadError(await writeSource("object.json", '{"faq": []}'));
    expect(error.issues).toEqual(["FAQ source must be a JSON array of question/answer records."]);
  });

  it("reports every unusable record", async () => {
    const file = await writeSource(
      "records.json",
      JSON.stringify([{ question: "Spa hours?" }, { question: "   ", answer: "9 to 5" }, "hello"])
    );

    const error = await loadError(file);
    expect(error.issues).toEqual([
      "[0.answer] answer is required.",
      "[1.question] question must not be empty.",
      "[2] Expected object, received string",
    ]);
  });

  describe("alternate questions", () => {
    const records = [
      {
        question: "What time is check-in?",
        answer: "Check-in starts at 3:00 PM.",
        alts: [" When can I get my room key? "],
      },
      { question: "Are pets allowed?", answer: "Small dogs only.", alternates: ["Can I bring my dog?"] },
      { question: "What time is check-in?", answer: "Check-in starts at 3:00 PM." },
    ];

    it("expands alternates after their primary question and drops repeated pairs", async () => {
      const file = await writeSource("alts.json", JSON.stringify(records));

      const corpus = await repository.load(file);

      expect(corpus.map((e) => e.toJSON())).toEqual([
        { question: "What time is check-in?", answer: "Check-in starts at 3:00 PM." },
        { question: "When can I get my room key?", answer: "Check-in starts at 3:00 PM." },
        { question: "Are pets allowed?", answer: "Small dogs only." },
        { question: "Can I bring my dog?", answer: "Small dogs only." },
      ]);
    });

    it("answers a query that only matches an alternate", async () => {
      const file = await writeSource("alts-retrieval.json", JSON.stringify(records));
      const corpus = await repository.load(file);

      const result = answerQuery("room key", VectorIndex.build(corpus), corpus, 0.2);

      expect(result.matchedIndex).toBe(1);
      expect(result.answer).toBe("Check-in starts at 3:00 PM.");
      expect(result.score).toBeCloseTo(2 / Math.sqrt(6), 10);
    });

    it("rejects a blank alternate", async () => {
      const file = await writeSource(
        "alts-blank.json",
        JSON.stringify([{ question: "Spa hours?", answer: "9 to 5", alts: ["  "] }])
      );

      const error = await loadError(file);
      expect(error.issues).toEqual(["[0.alts.0] alternate question must not be empty."]);
    });
  });
});
