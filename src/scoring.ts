import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { NumericValue } from "./normalize.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const LEXICON_PATH = join(__dirname, "..", "resources", "lexicon.json");

const MAX_KEYWORDS = 10;

// `\b` only knows ASCII; these treat any letter, digit or underscore as part of a word.
const KEYWORD_PATTERN = /(?<![\p{L}\p{N}_])[a-z]{3,}(?![\p{L}\p{N}_])/gu;
const LEXICON_WORD_PATTERN = /(?<![\p{L}\p{N}_])[a-z]+(?![\p{L}\p{N}_])/gu;

const lexiconSchema = z.object({
  stopwords: z.array(z.string()),
  positive: z.array(z.string()),
  negative: z.array(z.string()),
});

interface Lexicon {
  stopwords: ReadonlySet<string>;
  positive: ReadonlySet<string>;
  negative: ReadonlySet<string>;
}

let lexicon: Lexicon | null = null;

function getLexicon(): Lexicon {
  if (!lexicon) {
    const raw = lexiconSchema.parse(JSON.parse(readFileSync(LEXICON_PATH, "utf-8")));
    lexicon = {
      stopwords: new Set(raw.stopwords),
      positive: new Set(raw.positive),
      negative: new Set(raw.negative),
    };
  }
  return lexicon;
}

export type ComplexityLevel = "Very Easy" | "Easy" | "Moderate" | "Difficult" | "Very Difficult";
export type Sentiment = "Positive" | "Negative" | "Neutral";

export type PromptAnalysis = {
  word_count: NumericValue;
  character_count: NumericValue;
  sentence_count: NumericValue;
  paragraph_count: NumericValue;
  readability_score: NumericValue;
  complexity_level: ComplexityLevel;
  keywords: string[];
  sentiment: Sentiment;
  suggestions: string[];
};

function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export function syllablesPerWord(text: string): number {
  const all = words(text.toLowerCase());
  if (all.length === 0) return 0;

  let total = 0;
  for (const raw of all) {
    const word = raw.replace(/[^a-z]/g, "");
    if (!word) continue;
    let syllables = word.match(/[aeiouy]+/g)?.length ?? 0;
    // silent trailing e
    if (word.endsWith("e") && syllables > 1) syllables--;
    total += Math.max(1, syllables);
  }
  return total / all.length;
}

export function complexityLevel(score: number): ComplexityLevel {
  if (score >= 80) return "Very Easy";
  if (score >= 60) return "Easy";
  if (score >= 40) return "Moderate";
  if (score >= 20) return "Difficult";
  return "Very Difficult";
}

export function extractKeywords(text: string): string[] {
  const { stopwords } = getLexicon();
  const counts = new Map<string, number>();
  for (const word of text.toLowerCase().match(KEYWORD_PATTERN) ?? []) {
    if (stopwords.has(word)) continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  // sort is stable, so equal counts keep first-seen order
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, MAX_KEYWORDS)
    .map(([word]) => word);
}

export function analyzeSentiment(text: string): Sentiment {
  const { positive, negative } = getLexicon();
  let score = 0;
  for (const word of text.toLowerCase().match(LEXICON_WORD_PATTERN) ?? []) {
    if (positive.has(word)) score++;
    if (negative.has(word)) score--;
  }
  if (score > 0) return "Positive";
  if (score < 0) return "Negative";
  return "Neutral";
}

function hasCasedLetters(text: string): boolean {
  return text !== text.toLowerCase() || text !== text.toUpperCase();
}

export function generateSuggestions(
  prompt: string,
  wordCount: number,
  sentenceCount: number
): string[] {
  const suggestions: string[] = [];

  if (wordCount < 10) {
    suggestions.push("Consider adding more detail to make your prompt more specific.");
  } else if (wordCount > 200) {
    suggestions.push("Consider shortening your prompt for better clarity.");
  }

  if (wordCount / Math.max(sentenceCount, 1) > 25) {
    suggestions.push("Try breaking long sentences into shorter ones for better readability.");
  }

  if (!/[.!?]/.test(prompt)) {
    suggestions.push("Add punctuation to improve prompt structure.");
  }

  if (hasCasedLetters(prompt)) {
    if (prompt === prompt.toUpperCase()) {
      suggestions.push("Consider using mixed case instead of all caps.");
    } else if (prompt === prompt.toLowerCase()) {
      suggestions.push("Consider proper capitalization for better presentation.");
    }
  }

  if (suggestions.length === 0) {
    suggestions.push("Your prompt looks well-structured!");
  }
  return suggestions;
}

/** Score a single prompt's text. Stateless; reads only the bundled lexicon. */
export function analyzePrompt(prompt: string): PromptAnalysis {
  const wordCount = words(prompt).length;
  const sentenceCount = prompt.split(/[.!?]+/).filter((s) => s.trim()).length;
  const paragraphCount = prompt.split("\n\n").filter((p) => p.trim()).length;

  const avgSentenceLength = wordCount / Math.max(sentenceCount, 1);
  const readability = 206.835 - 1.015 * avgSentenceLength - 84.6 * syllablesPerWord(prompt);

  return {
    word_count: NumericValue.integer(wordCount),
    character_count: NumericValue.integer([...prompt].length),
    sentence_count: NumericValue.integer(sentenceCount),
    paragraph_count: NumericValue.integer(paragraphCount),
    readability_score: NumericValue.float(readability, 2),
    complexity_level: complexityLevel(readability),
    keywords: extractKeywords(prompt),
    sentiment: analyzeSentiment(prompt),
    suggestions: generateSuggestions(prompt, wordCount, sentenceCount),
  };
}
