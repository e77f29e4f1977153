import { describe, it, expect } from "vitest";
import { decodeAccents, replaceAccents } from "../src/utils/accents.js";

describe("replaceAccents", () => {
  it("unwraps and decodes a bracketed token", () => {
    expect(replaceAccents("〔o:〕")).toBe("ö");
  });

  it("decodes tokens inside longer words", () => {
    expect(replaceAccents("〔Scho:n〕")).toBe("Schön");
    expect(replaceAccents("〔cafe'〕にて")).toBe("caféにて");
    expect(replaceAccents("〔AE&on〕")).toBe("Æon");
  });

  it("handles several spans on one line", () => {
    expect(replaceAccents("〔a`〕 la 〔e'〕")).toBe("à la é");
  });

  it("leaves text outside the brackets alone", () => {
    expect(replaceAccents("don't 〔e'〕")).toBe("don't é");
    expect(replaceAccents("don't stop")).toBe("don't stop");
  });
});

describe("decodeAccents", () => {
  it("decodes two and three character tokens", () => {
    expect(decodeAccents("s&")).toBe("ß");
    expect(decodeAccents("oe&uvre")).toBe("œuvre");
    expect(decodeAccents("plain")).toBe("plain");
  });
});
