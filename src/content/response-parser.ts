import type { ContentResult, Coordinates } from "../tracking/types.js";

const ANSWER_BLOCK = /<answer>([\s\S]*?)<\/answer>/i;
const FIELD_LINE = /^(location|coordinates|search|sources|interesting fact)\s*:\s*(.*)$/i;

const LEGACY_PLACE = "Локация:";
const LEGACY_FACT = "Интересный факт:";

/** Parse "48.8584, 2.2945" into coordinates, rejecting out-of-range values. */
export function parseCoordinates(text: string): Coordinates | undefined {
  const match = text.match(/(-?\d+(?:\.\d+)?)\s*[,;\s]\s*(-?\d+(?:\.\d+)?)/);
  if (!match) return undefined;
  const latitude = Number(match[1]);
  const longitude = Number(match[2]);
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return undefined;
  return { latitude, longitude };
}

function parseAnswerBlock(content: string, fallbackPlace: string, raw: string): ContentResult {
  let place = fallbackPlace;
  let companionPosition: Coordinates | undefined;
  const factLines: string[] = [];
  let inFact = false;

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    const field = trimmed.match(FIELD_LINE);
    if (field) {
      const name = field[1].toLowerCase();
      const value = field[2].trim();
      inFact = name === "interesting fact";
      if (name === "location" && value) place = value;
      else if (name === "coordinates") companionPosition = parseCoordinates(value);
      else if (inFact && value) factLines.push(value);
      continue;
    }
    if (inFact && trimmed) factLines.push(trimmed);
  }

  const summary = factLines.length > 0 ? factLines.join(" ") : content.trim();
  return { place, summary, companionPosition, raw };
}

function parseLegacy(raw: string, fallbackPlace: string): ContentResult {
  const lines = raw.split("\n");
  let place = fallbackPlace;
  let summary = raw.trim();

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.startsWith(LEGACY_PLACE)) {
      place = line.slice(LEGACY_PLACE.length).trim() || fallbackPlace;
    } else if (line.startsWith(LEGACY_FACT)) {
      // The fact runs to the end of the text
      const factLines = [line.slice(LEGACY_FACT.length).trim()];
      for (const rest of lines.slice(i + 1)) {
        if (rest.trim()) factLines.push(rest.trim());
      }
      summary = factLines.filter(Boolean).join(" ");
      break;
    }
  }

  return { place, summary, raw };
}

/**
 * Best-effort split of generated text into place and summary. Unstructured
 * text is never an error: it becomes the summary, and the place falls back
 * to `fallbackPlace`.
 */
export function parseContent(raw: string, fallbackPlace: string): ContentResult {
  const answer = raw.match(ANSWER_BLOCK);
  if (answer) {
    return parseAnswerBlock(answer[1], fallbackPlace, raw);
  }
  return parseLegacy(raw, fallbackPlace);
}
