import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "path";
import { resolveConfig, type EffectiveConfig } from "../src/config.ts";
import { InvalidSlugError } from "../src/errors.ts";
import { Logger } from "../src/logger.ts";
import {
  catalogEntries,
  checkSlug,
  destinationFor,
  destinationForSource,
  formatSlug,
  isPartialSlug,
  parseSlug,
  resolveSource,
  slugFromSource,
  slugsFromCatalog,
  sourceExists,
} from "../src/pathMapper.ts";
import {
  EXTENSION_GLOB,
  hasSourceExtension,
  isPartialFile,
  listSources,
} from "../src/sourceCatalog.ts";
import { TempProject, silentLogger } from "./utils/tempProject.ts";

describe("Source catalog and path mapping", () => {
  let project: TempProject;
  let config: EffectiveConfig;

  beforeEach(() => {
    project = new TempProject();
    project.writeSources({
      "screen.less": "body{color:red}\n",
      "_vars.less": "@color: red;\n",
      "admin/forms.lss": "form{margin:0}\n",
      "admin/_mixins.less": ".m(){}\n",
      "print.css": "body{}\n",
      "notes.txt": "not a stylesheet",
    });
    config = resolveConfig({ environment: "production", projectRoot: project.root }, {});
  });

  afterEach(() => {
    project.cleanup();
  });

  describe("Catalog", () => {
    it("should build the extension alternation", () => {
      expect(EXTENSION_GLOB).toBe(".{less,lss}");
    });

    it("should recognise source extensions and partials", () => {
      expect(hasSourceExtension("/a/screen.less")).toBe(true);
      expect(hasSourceExtension("/a/screen.lss")).toBe(true);
      expect(hasSourceExtension("/a/screen.css")).toBe(false);
      expect(isPartialFile("/a/_vars.less")).toBe(true);
      expect(isPartialFile("/a_b/vars.less")).toBe(false);
    });

    it("should list every source recursively, partials included", async () => {
      const sources = await listSources(config);

      expect(sources).toEqual(
        [
          join(project.sourcePath, "_vars.less"),
          join(project.sourcePath, "admin", "_mixins.less"),
          join(project.sourcePath, "admin", "forms.lss"),
          join(project.sourcePath, "screen.less"),
        ].sort(),
      );
    });

    it("should rescan on every call", async () => {
      expect(await listSources(config)).toHaveLength(4);

      project.writeSources({ "late.less": "a{}" });

      expect(await listSources(config)).toHaveLength(5);
    });

    it("should return nothing for a missing source root", async () => {
      const missing = resolveConfig({ projectRoot: join(project.root, "nowhere") }, {});

      expect(await listSources(missing)).toEqual([]);
    });
  });

  describe("Slugs", () => {
    it("should parse and format slugs", () => {
      expect(parseSlug("admin/forms")).toEqual(["admin", "forms"]);
      expect(formatSlug(["admin", "forms"])).toBe("admin/forms");
    });

    it("should reject slugs that leave the source root", () => {
      expect(checkSlug([])).toBe("slug must have at least one segment");
      expect(checkSlug(["admin", ""])).toBe("slug segments must not be empty");
      expect(checkSlug(["..", "secrets"])).toBe(
        'slug segment ".." would leave the source root',
      );
      expect(checkSlug(["a/b"])).toBe('slug segment "a/b" contains a path separator');
      expect(checkSlug(["admin", "forms"])).toBeUndefined();
    });

    it("should flag partial slugs by their last segment", () => {
      expect(isPartialSlug(["_vars"])).toBe(true);
      expect(isPartialSlug(["_admin", "forms"])).toBe(false);
    });
  });

  describe("resolveSource", () => {
    it("should find sources with either extension", async () => {
      expect(await resolveSource(["screen"], config)).toBe(
        join(project.sourcePath, "screen.less"),
      );
      expect(await resolveSource(["admin", "forms"], config)).toBe(
        join(project.sourcePath, "admin", "forms.lss"),
      );
    });

    it("should return undefined for missing sources", async () => {
      expect(await resolveSource(["missing"], config)).toBeUndefined();
      expect(await resolveSource(["print"], config)).toBeUndefined();
    });

    it("should treat glob characters in slugs literally", async () => {
      expect(await resolveSource(["*"], config)).toBeUndefined();
      expect(await resolveSource(["scr?en"], config)).toBeUndefined();
    });

    it("should pick .less over .lss and warn when both exist", async () => {
      project.writeSources({ "screen.lss": "body{color:blue}\n" });
      const logger = new Logger({ silent: true });
      const warn = vi.spyOn(logger, "warn");

      const source = await resolveSource(["screen"], config, logger);

      expect(source).toBe(join(project.sourcePath, "screen.less"));
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it("should throw InvalidSlugError for traversal attempts", async () => {
      await expect(resolveSource(["..", "etc"], config)).rejects.toBeInstanceOf(
        InvalidSlugError,
      );
    });
  });

  describe("sourceExists", () => {
    it("should be true for compilable sources", async () => {
      expect(await sourceExists(["screen"], config, silentLogger())).toBe(true);
      expect(await sourceExists(["admin", "forms"], config, silentLogger())).toBe(true);
    });

    it("should be false for partials even though the file exists", async () => {
      expect(await sourceExists(["_vars"], config, silentLogger())).toBe(false);
      expect(await sourceExists(["admin", "_mixins"], config, silentLogger())).toBe(false);
    });

    it("should be false for missing and invalid slugs", async () => {
      expect(await sourceExists(["missing"], config, silentLogger())).toBe(false);
      expect(await sourceExists(["..", "screen"], config, silentLogger())).toBe(false);
      expect(await sourceExists([], config, silentLogger())).toBe(false);
    });
  });

  describe("destinationFor", () => {
    it("should join output root, destination path and segments", () => {
      expect(destinationFor(["screen"], config)).toBe(
        join(project.root, "public", "stylesheets", "screen.css"),
      );
      expect(destinationFor(["admin", "forms"], config)).toBe(
        join(project.root, "public", "stylesheets", "admin", "forms.css"),
      );
    });

    it("should follow the configured destination path", () => {
      const custom = resolveConfig(
        { projectRoot: project.root, destinationPath: "assets/css" },
        {},
      );

      expect(destinationFor(["screen"], custom)).toBe(
        join(project.root, "public", "assets", "css", "screen.css"),
      );
    });
  });

  describe("Catalog slugs", () => {
    it("should strip the source root and extension", () => {
      expect(
        slugFromSource(join(project.sourcePath, "admin", "forms.lss"), config),
      ).toEqual(["admin", "forms"]);
    });

    it("should list slugs of non-partial sources only", async () => {
      const slugs = await slugsFromCatalog(config);

      expect(slugs).toEqual([["admin", "forms"], ["screen"]]);
    });

    it("should map catalog files to artifacts without slug checks", () => {
      expect(destinationForSource(join(project.sourcePath, "admin", "forms.lss"), config)).toBe(
        join(project.root, "public", "stylesheets", "admin", "forms.css"),
      );
      expect(destinationForSource(join(project.sourcePath, "a\\b.less"), config)).toBe(
        join(project.root, "public", "stylesheets", "a\\b.css"),
      );
    });

    it("should keep one entry per artifact and warn about the rest", async () => {
      project.writeSources({ "screen.lss": "body{color:blue}\n" });
      const logger = new Logger({ silent: true });
      const warn = vi.spyOn(logger, "warn");

      const entries = await catalogEntries(config, logger);

      expect(entries).toEqual([
        {
          slug: ["admin", "forms"],
          source: join(project.sourcePath, "admin", "forms.lss"),
          destination: join(project.root, "public", "stylesheets", "admin", "forms.css"),
        },
        {
          slug: ["screen"],
          source: join(project.sourcePath, "screen.less"),
          destination: join(project.root, "public", "stylesheets", "screen.css"),
        },
      ]);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(await slugsFromCatalog(config, logger)).toEqual([["admin", "forms"], ["screen"]]);
    });
  });
});
