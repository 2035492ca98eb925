import { describe, it, expect, afterEach } from "vitest";
import { symlinkSync } from "fs";
import { join } from "path";
import {
  discoverResources,
  findCoverImage,
  findSourceText,
  listImages,
} from "../app/lib/processing/discovery";
import { resolveConfig } from "../app/lib/processing/config";
import { ResourceNotFoundError } from "../app/lib/processing/errors";
import { createWorkDir, fakeImage, removeWorkDir } from "./helpers";

const COVER_EXTENSIONS = ["jpg", "png", "jpeg"];

describe("discovery", () => {
  let dir = "";

  afterEach(() => {
    if (dir) removeWorkDir(dir);
    dir = "";
  });

  describe("findCoverImage", () => {
    it("should prefer jpg over png when each has one file", () => {
      dir = createWorkDir({ "a.jpg": fakeImage("a"), "b.png": fakeImage("b") });

      expect(findCoverImage(dir, COVER_EXTENSIONS)).toBe(join(dir, "a.jpg"));
    });

    it("should fail when the only extension present is ambiguous", () => {
      dir = createWorkDir({ "a.jpg": fakeImage("a"), "b.jpg": fakeImage("b") });

      expect(() => findCoverImage(dir, COVER_EXTENSIONS)).toThrow(ResourceNotFoundError);
    });

    it("should fall through an ambiguous extension to the next one", () => {
      dir = createWorkDir({
        "a.jpg": fakeImage("a"),
        "b.jpg": fakeImage("b"),
        "cover.png": fakeImage("cover"),
      });

      expect(findCoverImage(dir, COVER_EXTENSIONS)).toBe(join(dir, "cover.png"));
    });

    it("should fail with the cover resource when no image exists", () => {
      dir = createWorkDir({ "novel.txt": "text" });

      try {
        findCoverImage(dir, COVER_EXTENSIONS);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ResourceNotFoundError);
        if (error instanceof ResourceNotFoundError) {
          expect(error.resource).toBe("cover");
          expect(error.directory).toBe(dir);
        }
      }
    });

    it("should ignore hidden files", () => {
      dir = createWorkDir({ ".thumb.jpg": fakeImage("thumb"), "cover.jpg": fakeImage("cover") });

      expect(findCoverImage(dir, COVER_EXTENSIONS)).toBe(join(dir, "cover.jpg"));
    });

    it("should follow a symlinked cover and skip a dangling link", () => {
      dir = createWorkDir({ "assets/art.jpg": fakeImage("art") });
      symlinkSync(join(dir, "assets", "art.jpg"), join(dir, "cover.jpg"));
      symlinkSync(join(dir, "assets", "missing.png"), join(dir, "broken.png"));

      expect(findCoverImage(dir, COVER_EXTENSIONS)).toBe(join(dir, "cover.jpg"));
      expect(() => findCoverImage(dir, ["png"])).toThrow(ResourceNotFoundError);
    });

    it("should match extensions case-sensitively", () => {
      dir = createWorkDir({ "cover.JPG": fakeImage("cover") });

      expect(() => findCoverImage(dir, COVER_EXTENSIONS)).toThrow(ResourceNotFoundError);
    });
  });

  describe("findSourceText", () => {
    it("should pick the lexicographically first .txt and report the rest", () => {
      dir = createWorkDir({ "b.txt": "b", "a.txt": "a", "c.md": "c" });

      expect(findSourceText(dir)).toEqual({
        sourcePath: join(dir, "a.txt"),
        ignoredSources: [join(dir, "b.txt")],
      });
    });

    it("should fail with the source resource when no .txt exists", () => {
      dir = createWorkDir({ "cover.jpg": fakeImage("cover") });

      expect(() => findSourceText(dir)).toThrow(/No \.txt source file/);
    });
  });

  describe("listImages", () => {
    it("should sort image files and leave out everything else", () => {
      dir = createWorkDir({
        "images/10.jpg": fakeImage("10"),
        "images/02.png": fakeImage("02"),
        "images/notes.txt": "not an image",
        "images/.DS_Store": "junk",
        "images/nested/03.jpg": fakeImage("03"),
      });

      expect(listImages(join(dir, "images"))).toEqual(["02.png", "10.jpg"]);
    });

    it("should include symlinked images", () => {
      dir = createWorkDir({ "images/01.jpg": fakeImage("01"), "shared/02.jpg": fakeImage("02") });
      symlinkSync(join(dir, "shared", "02.jpg"), join(dir, "images", "02.jpg"));

      expect(listImages(join(dir, "images"))).toEqual(["01.jpg", "02.jpg"]);
    });

    it("should propagate the error for a missing directory", () => {
      dir = createWorkDir({});

      expect(() => listImages(join(dir, "images"))).toThrow();
    });
  });

  describe("discoverResources", () => {
    it("should collect every resource using the configured directories", () => {
      dir = createWorkDir({
        "novel.txt": "text",
        "cover.jpeg": fakeImage("cover"),
        "art/002.jpg": fakeImage("2"),
        "art/001.jpg": fakeImage("1"),
        "front/b.png": fakeImage("b"),
        "front/a.png": fakeImage("a"),
      });

      const resources = discoverResources(
        dir,
        resolveConfig({ placeholderDir: "art", frontImageDir: "front" }),
      );

      expect(resources).toEqual({
        sourcePath: join(dir, "novel.txt"),
        ignoredSources: [],
        coverPath: join(dir, "cover.jpeg"),
        placeholderImages: ["001.jpg", "002.jpg"],
        frontImages: ["a.png", "b.png"],
      });
    });
  });
});
