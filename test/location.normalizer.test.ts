import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { Database } from "../database/index.ts";
import {
  LOCATION_RULES,
  buildLocationMacroSql,
  normalizeLocation,
} from "../services/location/location.normalizer.ts";
import { LOCATION_CATEGORIES } from "../services/types.ts";

const silent = { info() {}, warn() {}, debug() {} };

describe("normalizeLocation", () => {
  it("maps missing and blank text to Unknown", () => {
    expect(normalizeLocation(null)).toBe("Unknown");
    expect(normalizeLocation(undefined)).toBe("Unknown");
    expect(normalizeLocation("")).toBe("Unknown");
    expect(normalizeLocation("   \t ")).toBe("Unknown");
    expect(normalizeLocation("\u00a0\u3000\v\ufeff")).toBe("Unknown");
  });

  it("maps unmatched text to Other", () => {
    expect(normalizeLocation("random unmapped tissue")).toBe("Other");
  });

  it.each([
    ["Mitochondrion matrix", "Mitochondrion"],
    ["Endoplasmic reticulum lumen", "Endoplasmic Reticulum"],
    ["trans-Golgi network", "Golgi apparatus"],
    ["Cell surface", "Plasma membrane"],
    ["Lysosome lumen", "Lysosome"],
    ["Early endosome", "Endosome"],
    ["Peroxisome", "Peroxisome"],
    ["Cytosol", "Cytoplasm"],
    ["Chromosome, centromere", "Nucleus"],
    ["Intermediate filament", "Cytoskeleton"],
    ["Secreted", "Extracellular"],
    ["Ribosome", "Ribosome"],
    ["Centrosome", "Centrosome"],
    ["Single-pass type I membrane protein", "Membrane"],
  ])("%s → %s", (text, expected) => {
    expect(normalizeLocation(text)).toBe(expected);
  });

  it("matches case-insensitively", () => {
    expect(normalizeLocation("MITOCHONDRION")).toBe("Mitochondrion");
    expect(normalizeLocation("nUcLeUs")).toBe("Nucleus");
  });

  it("lets earlier rules win for multi-keyword text", () => {
    expect(normalizeLocation("nuclear membrane")).toBe("Nucleus");
    expect(normalizeLocation("Cell membrane; Single-pass membrane protein")).toBe("Plasma membrane");
    expect(normalizeLocation("Mitochondrion outer membrane")).toBe("Mitochondrion");
    expect(normalizeLocation("Cytoplasm; Cytoskeleton")).toBe("Cytoplasm");
    expect(normalizeLocation("Nucleus; Cytoplasm")).toBe("Cytoplasm");
  });

  it("keeps the generic membrane rule last", () => {
    expect(LOCATION_RULES[LOCATION_RULES.length - 1]?.category).toBe("Membrane");
  });

  it("only returns known labels", () => {
    const inputs = ["", "x", "membrane", "golgi", "actin", "Secreted; extracellular space", "???"];
    for (const s of inputs) {
      expect(LOCATION_CATEGORIES).toContain(normalizeLocation(s));
    }
  });
});

describe("loc_category SQL macro", () => {
  let db: Database;

  beforeAll(async () => {
    db = await Database.open(silent);
    await db.exec(buildLocationMacroSql());
  });

  afterAll(() => {
    db.close();
  });

  async function sqlCategory(text: string | null): Promise<unknown> {
    const rows = await db.query("SELECT loc_category(CAST($1 AS VARCHAR)) AS c;", [text]);
    return rows[0]?.c;
  }

  it.each([
    [null],
    [""],
    ["   "],
    ["\t\n\r\f"],
    ["\u00a0"],
    ["\v"],
    ["\u3000"],
    ["\u2028\u202f\ufeff"],
    ["\u00a0Golgi\u3000"],
    ["nuclear membrane"],
    ["Cell membrane; Single-pass membrane protein"],
    ["Golgi apparatus membrane"],
    ["Cytoplasm; Cytoskeleton"],
    ["Secreted"],
    ["Mitochondrion inner membrane"],
    ["Perinuclear region"],
    ["random unmapped tissue"],
    ["it's 100% _unknown_"],
  ])("agrees with normalizeLocation for %j", async (text) => {
    expect(await sqlCategory(text)).toBe(normalizeLocation(text));
  });
});
