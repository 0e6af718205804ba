import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { SentimentModelLoader, toSentimentLabel } from "../src/business/services/SentimentModelLoader";
import { SentimentModelUnavailableError } from "../src/business/errors/SentimentModelUnavailableError";

const vectorizer = { vocabulary: { tasty: 0, bland: 1 }, idf: [1.5, 1.5] };

describe("SentimentModelLoader", () => {
  let dir: string;
  const loader = new SentimentModelLoader();

  const writeArtifact = async (name: string, content: unknown) => {
    const file = path.join(dir, name);
    await fs.writeFile(file, JSON.stringify(content), "utf8");
    return file;
  };

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "sentiment-model-"));
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterAll(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads a binary model with string labels", async () => {
    const model = await writeArtifact("binary.json", {
      classes: ["negative", "positive"],
      coef: [[1.2, -1.2]],
      intercept: [0],
    });
    const client = await loader.load(model, await writeArtifact("vectorizer.json", vectorizer));

    expect(client.predict("tasty").label).toBe("Positive");
    expect(client.predict("bland").label).toBe("Negative");
  });

  it("fails when an artifact is missing", async () => {
    const vec = await writeArtifact("vectorizer.json", vectorizer);
    await expect(loader.load(path.join(dir, "nope.json"), vec)).rejects.toBeInstanceOf(
      SentimentModelUnavailableError
    );
  });

  it("fails when coefficient rows do not fit the vocabulary", async () => {
    const model = await writeArtifact("wide.json", {
      classes: [0, 1, 2],
      coef: [[1, 2, 3], [1, 2, 3], [1, 2, 3]],
      intercept: [0, 0, 0],
    });
    const vec = await writeArtifact("vectorizer.json", vectorizer);

    await expect(loader.load(model, vec)).rejects.toThrow(/every coefficient row must have 2 columns/);
  });

  it("fails on a class label it cannot map", async () => {
    const model = await writeArtifact("labels.json", {
      classes: ["angry", "happy"],
      coef: [[1, -1]],
      intercept: [0],
    });
    const vec = await writeArtifact("vectorizer.json", vectorizer);

    await expect(loader.load(model, vec)).rejects.toThrow(/unknown class label "angry"/);
  });

  it("fails when the vocabulary points past the idf table", async () => {
    const model = await writeArtifact("ok.json", { classes: [0, 2], coef: [[1, -1]], intercept: [0] });
    const vec = await writeArtifact("short-idf.json", { vocabulary: { tasty: 0, bland: 5 }, idf: [1, 1] });

    await expect(loader.load(model, vec)).rejects.toThrow(/vocabulary term "bland" points past the idf table/);
  });
});

describe("toSentimentLabel", () => {
  it("maps numeric and named classes", () => {
    expect(toSentimentLabel(0)).toBe("Negative");
    expect(toSentimentLabel("1")).toBe("Neutral");
    expect(toSentimentLabel(2)).toBe("Positive");
    expect(toSentimentLabel("NEGATIVE")).toBe("Negative");
  });

  it("returns null for anything else", () => {
    expect(toSentimentLabel("constructor")).toBeNull();
    expect(toSentimentLabel(7)).toBeNull();
  });
});
