import { describe, it, expect } from "vitest";
import { filenameToTitle } from "./filename-to-title";

describe("filenameToTitle", () => {
  it("capitalizes a single-letter name", () => {
    expect(filenameToTitle("b.html")).toBe("B");
  });

  it("splits on underscores and hyphens", () => {
    expect(filenameToTitle("color_picker.html")).toBe("Color Picker");
    expect(filenameToTitle("dark-mode-toggle.html")).toBe("Dark Mode Toggle");
  });

  it("keeps leading numbers as part of the title", () => {
    expect(filenameToTitle("404-page.html")).toBe("404 Page");
    expect(filenameToTitle("3-body-problem.html")).toBe("3 Body Problem");
  });

  it("collapses repeated separators", () => {
    expect(filenameToTitle("css--grid_.html")).toBe("Css Grid");
  });

  it("lowercases the rest of each word", () => {
    expect(filenameToTitle("README_notes.html")).toBe("Readme Notes");
    expect(filenameToTitle("webGL_demo.html")).toBe("Webgl Demo");
  });
});
