import { describe, it, expect } from "vitest";
import path from "node:path";
import { buildTargetPath } from "./destination.js";

describe("buildTargetPath", () => {
  it("builds YYYY/MM path by default", () => {
    const date = new Date(2023, 4, 10); // May 10, 2023
    const result = buildTargetPath("/source/DCIM/IMG_001.jpg", "/target/photos", date);
    expect(result).toBe(path.join("/target/photos", "2023", "05", "IMG_001.jpg"));
  });

  it("pads single-digit months with zero", () => {
    const date = new Date(2024, 0, 5);
    expect(buildTargetPath("/source/photo.jpg", "/target", date)).toBe(
      path.join("/target", "2024", "01", "photo.jpg")
    );
  });

  it("handles December correctly", () => {
    const date = new Date(2023, 11, 25);
    expect(buildTargetPath("/source/photo.dng", "/target", date, "month")).toBe(
      path.join("/target", "2023", "12", "photo.dng")
    );
  });

  it("builds YYYY/YYYY-MM-DD path for the day layout", () => {
    const date = new Date(2022, 6, 4, 23, 59);
    expect(buildTargetPath("/source/DSC0042.ARW", "/target", date, "day")).toBe(
      path.join("/target", "2022", "2022-07-04", "DSC0042.ARW")
    );
  });

  it("keeps the original filename including its case", () => {
    const date = new Date(2021, 2, 1);
    expect(path.basename(buildTargetPath("/in/My Photo.JPG", "/out", date))).toBe("My Photo.JPG");
  });
});
