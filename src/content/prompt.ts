import type { Coordinates, Language } from "../tracking/types.js";

const LANGUAGE_NAMES: Record<Language, string> = {
  en: "English",
  ru: "Russian",
  fr: "French",
};

export interface FactPromptParams {
  position: Coordinates;
  exclusions: string[];
  language: Language;
}

/**
 * Build the prompt for one nearby fact. The answer format is what
 * parseContent() reads back.
 */
export function buildFactPrompt({ position, exclusions, language }: FactPromptParams): string {
  const lat = position.latitude.toFixed(6);
  const lon = position.longitude.toFixed(6);

  const sections = [
    `You are a local guide. The user is walking and currently at coordinates ${lat}, ${lon}.`,
    "Pick one real, verifiable place within a few hundred meters and tell one surprising fact about it.",
    `Write the place name and the fact in ${LANGUAGE_NAMES[language]}. Keep the fact under 100 words.`,
  ];

  if (exclusions.length > 0) {
    sections.push(
      [
        "Already mentioned (do NOT repeat these places or facts, pick a DIFFERENT place):",
        ...exclusions.map((entry) => `- ${entry}`),
      ].join("\n")
    );
  }

  sections.push(
    [
      "Reply with exactly this block and nothing else:",
      "<answer>",
      "Location: <place name>",
      "Coordinates: <latitude>, <longitude>",
      "Interesting fact: <the fact>",
      "</answer>",
    ].join("\n")
  );

  return sections.join("\n\n");
}
