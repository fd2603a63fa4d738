import { describe, it, expect } from "vitest";
import { isDuplicatePlace, normalizePlaceName } from "../place-dedupe.js";

describe("normalizePlaceName", () => {
  it("drops the trailing city and leading kind of place", () => {
    expect(normalizePlaceName("Église Saint-Eustache, Paris")).toBe("saint eustache");
    expect(normalizePlaceName("Church of Saint-Eustache")).toBe("saint eustache");
  });

  it("maps well-known landmarks across languages to one name", () => {
    expect(normalizePlaceName("Tour Eiffel")).toBe("eiffel");
    expect(normalizePlaceName("Eiffel Tower")).toBe("eiffel");
    expect(normalizePlaceName("Red Square, Moscow")).toBe("krasnaya ploshchad");
    expect(normalizePlaceName("Красная площадь")).toBe("krasnaya ploshchad");
  });

  it("keeps the prefix when stripping would leave almost nothing", () => {
    expect(normalizePlaceName("La 1")).toBe("la 1");
  });

  it("returns an empty string for an empty name", () => {
    expect(normalizePlaceName("")).toBe("");
  });
});

describe("isDuplicatePlace", () => {
  it("matches the same place written differently", () => {
    expect(isDuplicatePlace("Musée du Louvre", ["The Louvre"])).toBe(true);
    expect(isDuplicatePlace("Church of Saint-Eustache", ["Old Mill", "Église Saint-Eustache, Paris"])).toBe(true);
  });

  it("matches when most words are shared", () => {
    expect(isDuplicatePlace("Pont Neuf Bridge", ["Pont Neuf"])).toBe(true);
  });

  it("does not match unrelated places", () => {
    expect(isDuplicatePlace("Clock Tower", ["Old Mill"])).toBe(false);
    expect(isDuplicatePlace("Rue de Rivoli", ["Rue Saint-Honoré"])).toBe(false);
  });

  it("never matches against an empty history or an empty candidate", () => {
    expect(isDuplicatePlace("Old Mill", [])).toBe(false);
    expect(isDuplicatePlace("", ["Old Mill"])).toBe(false);
  });
});
