import { describe, expect, it } from "vitest";
import {
  classifyQuestion,
  extractYear,
  normalizeQuestion,
  scoreByTokenOverlap,
  tokenize,
  truncate,
} from "../src/utils/text.js";

describe("text utils", () => {
  it("tokenizes words with singular variants of plurals", () => {
    expect(tokenize("Apples and oranges")).toEqual(["apples", "apple", "and", "oranges", "orange"]);
  });

  it("indexes CJK runs as character bigrams", () => {
    expect(tokenize("知识库")).toEqual(["知识", "识库"]);
  });

  it("scores overlap for Chinese query and target", () => {
    expect(scoreByTokenOverlap("知识库更新", "每个文档都有独立的知识库索引")).toBeGreaterThan(0);
    expect(scoreByTokenOverlap("", "anything")).toBe(0);
  });

  it("normalizes questions for cache keys", () => {
    expect(normalizeQuestion("  What  is RAG？ ")).toBe("what is rag");
    expect(normalizeQuestion("what is rag")).toBe(normalizeQuestion("WHAT IS RAG?"));
  });

  it("classifies statistical, evolution and general questions", () => {
    expect(classifyQuestion("How many times is inflation mentioned?")).toBe("statistical");
    expect(classifyQuestion("这个词出现了多少次")).toBe("statistical");
    expect(classifyQuestion("How did the view on AI change from 2019 to 2023?")).toBe("evolution");
    expect(classifyQuestion("观点如何变化")).toBe("evolution");
    expect(classifyQuestion("What is the refund policy?")).toBe("general");
  });

  it("extracts a year from a filename", () => {
    expect(extractYear("report_2021.pdf")).toBe(2021);
    expect(extractYear("1999-letter.txt")).toBe(1999);
    expect(extractYear("v1234.txt")).toBeNull();
  });

  it("truncates with an ellipsis after collapsing whitespace", () => {
    expect(truncate("a  b   c", 100)).toBe("a b c");
    expect(truncate("abcdefghij", 8)).toBe("abcde...");
  });
});
