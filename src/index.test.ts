import { describe, it, expect } from "vitest";
import { CatalogIntegrityError, NameGenError, createNameGenerator, defaultCatalog, parseName } from "./index.js";

describe("package entry", () => {
  it("exposes the generator and catalog", () => {
    const name = createNameGenerator(12345).generate();
    expect(name).toBe("white-water");
    expect(parseName(name, defaultCatalog)).toEqual({ adjective: "white", noun: "water" });
  });

  it("roots every error in NameGenError", () => {
    const err = new CatalogIntegrityError("words.json", "adjective list is empty");
    expect(err).toBeInstanceOf(NameGenError);
    expect(err.name).toBe("CatalogIntegrityError");
    expect(err.message).toBe("words.json: adjective list is empty");
  });
});
