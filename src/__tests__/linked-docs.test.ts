import { describe, it, expect } from "vitest";
import { collectExcerpts, isTechnicalLink, resolveDocumentPath } from "../docs/linked-docs.js";
import type { DocumentReader } from "../docs/linked-docs.js";
import { makeTask } from "./helpers/fixtures.js";

function memoryReader(files: Record<string, string>): DocumentReader & { reads: string[] } {
  const reads: string[] = [];
  return {
    reads,
    async readText(path) {
      reads.push(path);
      if (!Object.hasOwn(files, path)) throw new Error(`ENOENT: ${path}`);
      return files[path];
    },
  };
}

describe("resolveDocumentPath", () => {
  it("strips one leading ../ and resolves against the base", () => {
    expect(resolveDocumentPath("../docs/plan.md", "/base")).toBe("/base/docs/plan.md");
  });

  it("resolves plain relative paths against the base", () => {
    expect(resolveDocumentPath("notes/a.md", "/base")).toBe("/base/notes/a.md");
  });

  it("keeps absolute paths", () => {
    expect(resolveDocumentPath("/abs/p.md", "/base")).toBe("/abs/p.md");
  });

  it("skips remote and empty urls", () => {
    expect(resolveDocumentPath("https://example.com/plan.md", "/base")).toBeUndefined();
    expect(resolveDocumentPath("  ", "/base")).toBeUndefined();
  });
});

describe("isTechnicalLink", () => {
  it("looks for 'technical' in the name, ignoring case", () => {
    expect(isTechnicalLink({ name: "Technical Design", url: "" })).toBe(true);
    expect(isTechnicalLink({ name: "Overview", url: "" })).toBe(false);
  });
});

describe("collectExcerpts", () => {
  const files = {
    "/base/docs/overview.md": "# Overview\n## T1 Summary\nOverview text.",
    "/base/docs/tech.md": "# Tech\n## T1 Design\nTech text.\n## T2 Other\nx",
    "/base/docs/unrelated.md": "# Nothing here",
  };

  it("puts technical documents first and skips what cannot be used", async () => {
    const task = makeTask({
      id: "T1",
      links: [
        { name: "Overview", url: "../docs/overview.md" },
        { name: "Web", url: "https://example.com/x" },
        { name: "Missing", url: "../docs/none.md" },
        { name: "Unrelated", url: "../docs/unrelated.md" },
        { name: "Technical Design", url: "../docs/tech.md" },
      ],
    });
    const reader = memoryReader(files);

    const excerpts = await collectExcerpts(task, "/base", reader);

    expect(excerpts).toEqual([
      { name: "Technical Design", path: "/base/docs/tech.md", content: "## T1 Design\nTech text." },
      { name: "Overview", path: "/base/docs/overview.md", content: "## T1 Summary\nOverview text." },
    ]);
    expect(reader.reads).toEqual([
      "/base/docs/tech.md",
      "/base/docs/overview.md",
      "/base/docs/none.md",
      "/base/docs/unrelated.md",
    ]);
  });

  it("returns nothing for a task without links", async () => {
    expect(await collectExcerpts(makeTask({ id: "T1" }), "/base", memoryReader(files))).toEqual([]);
  });
});
