import { describe, it, expect } from "vitest";
import { buildAssetFilename } from "./filename";

const house = {
  id: 42,
  homeowner: "Jane Doe",
  address: "1 Main St",
  price: 250000,
  photoURL: "http://photos.test/42.jpg",
};

describe("buildAssetFilename", () => {
  it("joins id, homeowner and address with the extension", () => {
    expect(buildAssetFilename(house, "jpg")).toBe("42-Jane Doe-1 Main St.jpg");
  });

  it("keeps punctuation other than path separators", () => {
    expect(
      buildAssetFilename(
        { ...house, id: 7, homeowner: "O'Neil, Ann", address: "5 Oak Ave." },
        "png",
      ),
    ).toBe("7-O'Neil, Ann-5 Oak Ave..png");
  });

  it("replaces path separators", () => {
    expect(
      buildAssetFilename(
        { ...house, id: 3, homeowner: "A\\B", address: "12/B Elm St" },
        "png",
      ),
    ).toBe("3-A_B-12_B Elm St.png");
  });

  it("replaces path separators in the extension", () => {
    expect(buildAssetFilename(house, "../x")).toBe(
      "42-Jane Doe-1 Main St..._x",
    );
  });
});
