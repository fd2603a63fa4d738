import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const NORMALIZATION_FILE = path.resolve(__dirname, "../../data/place-normalization.json");

const NormalizationFileSchema = z.object({
  landmarks: z.array(z.tuple([z.string(), z.string()])),
  prefixes: z.array(z.string()),
});

interface NormalizationRules {
  landmarks: Array<[RegExp, string]>;
  prefixes: RegExp[];
}

let rules: NormalizationRules | null = null;

function loadRules(): NormalizationRules {
  if (rules) return rules;
  const raw = fs.readFileSync(NORMALIZATION_FILE, "utf-8");
  const parsed = NormalizationFileSchema.parse(JSON.parse(raw));
  rules = {
    landmarks: parsed.landmarks.map(([pattern, replacement]) => [new RegExp(pattern, "giu"), replacement]),
    prefixes: parsed.prefixes.map((prefix) => new RegExp(`^${prefix}`, "iu")),
  };
  return rules;
}

const TRAILING_CITY = /,\s*[a-zа-яёéèêëàâùûôîïç\s]+$/iu;
const SEPARATORS = /[-–—_/\\]/gu;
const PUNCTUATION = /[.,;:!?'"()[\]{}]/gu;

function basicCleanup(text: string): string {
  return text
    .replace(SEPARATORS, " ")
    .replace(PUNCTUATION, "")
    .replace(/\s+/gu, " ")
    .trim();
}

/**
 * Reduce a place name to a comparable form: "Église Saint-Eustache, Paris"
 * and "Church of Saint-Eustache" both become "saint eustache".
 */
export function normalizePlaceName(place: string): string {
  if (!place) return "";
  const { landmarks, prefixes } = loadRules();

  const base = place.toLowerCase().trim().replace(TRAILING_CITY, "");

  let normalized = base;
  for (const [pattern, replacement] of landmarks) {
    normalized = normalized.replace(pattern, replacement);
  }
  for (const prefix of prefixes) {
    normalized = normalized.replace(prefix, "");
  }
  normalized = basicCleanup(normalized);

  // "La 1" must not collapse to "1"
  if (normalized.length < 3) {
    return basicCleanup(base);
  }
  return normalized;
}

/**
 * True when `candidate` names the same place as one of `previous`: equal after
 * normalization, one contained in the other, or at least `threshold` of either
 * side's words shared.
 */
export function isDuplicatePlace(candidate: string, previous: string[], threshold = 0.7): boolean {
  if (!candidate || previous.length === 0) return false;

  const normalized = normalizePlaceName(candidate);
  if (!normalized) return false;
  const tokens = new Set(normalized.split(" "));

  for (const prev of previous) {
    const prevNormalized = normalizePlaceName(prev);
    if (!prevNormalized) continue;

    if (normalized === prevNormalized) return true;

    const prevTokens = new Set(prevNormalized.split(" "));
    let common = 0;
    for (const token of tokens) {
      if (prevTokens.has(token)) common++;
    }
    if (common / tokens.size >= threshold || common / prevTokens.size >= threshold) {
      return true;
    }

    if (normalized.includes(prevNormalized) || prevNormalized.includes(normalized)) {
      return true;
    }
  }

  return false;
}
