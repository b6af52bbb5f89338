import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { buildIndexContext, write } from "./writer";
import { loadIndexTemplate } from "../templates";
import { createContext } from "../generator";
import { fileExists, loadDefaultConfig, Logger, OutputWriteError } from "../utils";
import type { PageConfig, SnippetEntry } from "../types";

const page: PageConfig = {
  lang: "en",
  title: "Code Snippets Collection",
  heading: "Code Snippets",
  description: "A collection of code snippets",
  repositoryUrl: null,
  showTimestamp: false,
};

const entries: SnippetEntry[] = [
  { filename: "a.html", title: "Alpha", description: "First snippet" },
  { filename: "b.html", title: "B", description: "" },
];

async function render(list: SnippetEntry[], overrides: Partial<PageConfig> = {}) {
  const template = await loadIndexTemplate(null);
  return template(
    buildIndexContext(list, { ...page, ...overrides }, new Date(2024, 0, 5, 9, 3, 7)),
  );
}

describe("buildIndexContext", () => {
  it("encodes hrefs and omits the timestamp by default", () => {
    const context = buildIndexContext(
      [{ filename: "my snippet.html", title: "Mine", description: "" }],
      page,
    );

    expect(context.entries[0].href).toBe("my%20snippet.html");
    expect(context.generatedAt).toBeUndefined();
    expect(context.repositoryUrl).toBeUndefined();
  });

  it("encodes fragment and query characters in hrefs", () => {
    const context = buildIndexContext(
      [{ filename: "c#-tips?.html", title: "C# Tips", description: "" }],
      page,
    );

    expect(context.entries[0].href).toBe("c%23-tips%3F.html");
    expect(new URL(context.entries[0].href, "https://example.com/snips/").pathname).toBe(
      "/snips/c%23-tips%3F.html",
    );
  });

  it("formats the timestamp when enabled", () => {
    const context = buildIndexContext([], { ...page, showTimestamp: true }, new Date(2024, 0, 5, 9, 3, 7));
    expect(context.generatedAt).toBe("2024-01-05 09:03:07");
  });
});

describe("default index template", () => {
  it("renders one linked entry per snippet in order", async () => {
    const html = await render(entries);

    const alpha = html.indexOf('<h2><a href="a.html">Alpha</a></h2>');
    const beta = html.indexOf('<h2><a href="b.html">B</a></h2>');
    expect(alpha).toBeGreaterThan(-1);
    expect(beta).toBeGreaterThan(alpha);
    expect(html).toContain('<p class="snippet-description">First snippet</p>');
    expect(html).toContain('<span class="snippet-filename">b.html</span>');
    expect(html).toContain('<p class="snippet-count">Found 2 snippets</p>');
  });

  it("links to filenames with reserved characters", async () => {
    const html = await render([
      { filename: "c#-tips.html", title: "C# Tips", description: "" },
    ]);
    expect(html).toContain('<h2><a href="c%23-tips.html">C# Tips</a></h2>');
  });

  it("skips the description paragraph when empty", async () => {
    const html = await render([entries[1]]);
    expect(html).not.toContain('class="snippet-description"');
    expect(html).toContain('<p class="snippet-count">Found 1 snippet</p>');
  });

  it("shows the empty state", async () => {
    const html = await render([]);
    expect(html).toContain('<p class="snippet-count">No snippets found</p>');
    expect(html).not.toContain('<ul class="snippets-list">');
  });

  it("escapes titles and descriptions", async () => {
    const html = await render([
      { filename: "t.html", title: "Tips & <Tricks>", description: "a < b" },
    ]);
    expect(html).toContain('<h2><a href="t.html">Tips &amp; &lt;Tricks&gt;</a></h2>');
    expect(html).toContain('<p class="snippet-description">a &lt; b</p>');
  });

  it("renders page metadata", async () => {
    const html = await render([]);
    expect(html).toContain('<html lang="en">');
    expect(html).toContain("<title>Code Snippets Collection</title>");
    expect(html).toContain("<h1>Code Snippets</h1>");
  });

  it("leaves the footer out by default", async () => {
    const html = await render(entries);
    expect(html).not.toContain("<footer>");
  });

  it("renders the timestamp and repository link when configured", async () => {
    const html = await render(entries, {
      showTimestamp: true,
      repositoryUrl: "https://example.com/snippets",
    });
    expect(html).toContain(
      '<p>Generated on 2024-01-05 09:03:07 | <a href="https://example.com/snippets">View source</a></p>',
    );
  });

  it("renders the repository link alone", async () => {
    const html = await render(entries, { repositoryUrl: "https://example.com/snippets" });
    expect(html).toContain('<p><a href="https://example.com/snippets">View source</a></p>');
    expect(html).not.toContain("Generated on");
  });
});

describe("write", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "writer-test-"));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function context(outputPath: string, dryRun = false) {
    const ctx = createContext(await loadDefaultConfig(), {
      logger: new Logger("error"),
      dryRun,
    });
    ctx.entries = entries;
    ctx.outputPath = outputPath;
    return ctx;
  }

  it("overwrites the output file", async () => {
    const outputPath = path.join(tempDir, "index.html");
    await fs.writeFile(outputPath, "stale");

    const ctx = await context(outputPath);
    await write(ctx);

    expect(ctx.written).toBe(true);
    expect(await fs.readFile(outputPath, "utf-8")).toBe(ctx.html);
  });

  it("renders without writing on a dry run", async () => {
    const outputPath = path.join(tempDir, "dry.html");
    const ctx = await context(outputPath, true);
    await write(ctx);

    expect(ctx.written).toBe(false);
    expect(ctx.html).toContain("Alpha");
    expect(await fileExists(outputPath)).toBe(false);
  });

  it("raises OutputWriteError when the file cannot be written", async () => {
    const outputPath = path.join(tempDir, "missing-dir", "index.html");
    const ctx = await context(outputPath);

    await expect(write(ctx)).rejects.toBeInstanceOf(OutputWriteError);
    expect(ctx.written).toBe(false);
  });

  it("uses a custom template", async () => {
    const templatePath = path.join(tempDir, "custom.hbs");
    await fs.writeFile(templatePath, "{{#each entries}}{{filename}}={{title}};{{/each}}");

    const ctx = await context(path.join(tempDir, "custom.html"), true);
    ctx.config.output.template = templatePath;
    await write(ctx);

    expect(ctx.html).toBe("a.html=Alpha;b.html=B;");
  });

  it("requires the earlier stages", async () => {
    const ctx = createContext(await loadDefaultConfig(), {
      logger: new Logger("error"),
    });
    await expect(write(ctx)).rejects.toThrow("Scanner and extractor must run before writer");
  });
});
