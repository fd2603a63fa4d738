import { describe, it, expect } from "vitest";
import { fillTemplate, MessageCatalog } from "../messages.js";

describe("fillTemplate", () => {
  it("fills known placeholders and leaves unknown ones", () => {
    expect(fillTemplate("#{number} at {place} {other}", { number: 3, place: "Old Mill" })).toBe(
      "#3 at Old Mill {other}"
    );
  });
});

describe("MessageCatalog", () => {
  const catalog = MessageCatalog.fromFile();

  it("formats a numbered fact", () => {
    expect(catalog.fact("en", 2, "Old Mill", "It still turns.")).toBe(
      "🔴 *Fact #2*\n\n📍 *Place:* Old Mill\n\n💡 *Fact:* It still turns."
    );
  });

  it("formats the placeholder with the same numbering", () => {
    expect(catalog.failure("fr", 4)).toBe(
      "🔴 *Fait #4*\n\n😔 *Oups !*\n\nImpossible de trouver une information intéressante sur cet endroit."
    );
  });

  it("has a fallback place and every notice per language", () => {
    expect(catalog.nearYou("ru")).toBe("рядом с вами");
    expect(catalog.notice("en", "stopped")).toBe(
      "✅ *Live location stopped*\n\nStart a new live location anytime to keep exploring! 🗺️✨"
    );
    expect(catalog.notice("ru", "expired").startsWith("✅ *Сессия живой локации завершена*")).toBe(true);
    expect(catalog.notice("fr", "silent").startsWith("✅ *Diffusion arrêtée*")).toBe(true);
  });
});
