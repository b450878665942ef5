import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildRegistry, loadRunfile, parseRunfile, runfileVariables } from "../../core/runfile";
import { DuplicateTargetError, RunfileError, UnknownTargetError } from "../../errors";

describe("runfile", () => {
  describe("parseRunfile", () => {
    it("fills defaults for a minimal runfile", () => {
      expect(parseRunfile({})).toEqual({ targets: [], variables: {} });
    });

    it("reports schema violations with their paths", () => {
      let caught: unknown;
      try {
        parseRunfile({ targets: [{ name: "ok", deps: "not-a-list" }] }, "bad.json");
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(RunfileError);
      expect(caught).toMatchObject({ path: "bad.json" });
      expect(String(caught)).toContain("targets.0");
    });

    it("rejects unknown keys", () => {
      expect(() => parseRunfile({ targets: [], goals: [] })).toThrow(RunfileError);
    });

    it("rejects malformed target names", () => {
      expect(() => parseRunfile({ targets: [{ name: "has space" }] })).toThrow(RunfileError);
    });
  });

  describe("buildRegistry", () => {
    it("converts every command form", () => {
      const registry = buildRegistry(
        parseRunfile({
          targets: [
            { name: "tag", commands: ["git tag v1"] },
            {
              name: "cleanup",
              commands: [
                { run: "git tag -d v1", ignoreFailure: true },
                { run: ["git", "push", "origin", ":v1"], silent: true, substitute: false },
                { invoke: ["tag"], vars: { TAG: "v1" } },
              ],
            },
          ],
        })
      );

      expect(registry.lookup("tag").commands).toEqual([
        { ignoreFailure: false, kind: "shell", line: "git tag v1", silent: false, substitute: true },
      ]);
      expect(registry.lookup("cleanup").commands).toEqual([
        { ignoreFailure: true, kind: "shell", line: "git tag -d v1", silent: false, substitute: true },
        {
          argv: ["git", "push", "origin", ":v1"],
          ignoreFailure: false,
          kind: "exec",
          silent: true,
          substitute: false,
        },
        { ignoreFailure: false, kind: "invoke", targets: ["tag"], variables: { TAG: "v1" } },
      ]);
    });

    it("marks every target always-run and keeps descriptions and deps", () => {
      const registry = buildRegistry(
        parseRunfile({
          targets: [
            { name: "lint" },
            { name: "test", description: "Run all tests", deps: ["lint"] },
          ],
        })
      );

      expect(registry.lookup("test")).toEqual({
        alwaysRun: true,
        commands: [],
        description: "Run all tests",
        name: "test",
        prerequisites: ["lint"],
      });
    });

    it("registers sections", () => {
      const registry = buildRegistry(
        parseRunfile({
          targets: [{ section: "Development" }, { name: "docs", description: "Build docs" }],
        })
      );

      expect(registry.listDocumented()).toEqual([
        { kind: "section", title: "Development" },
        { description: "Build docs", kind: "target", name: "docs" },
      ]);
    });

    it("fails on duplicate targets", () => {
      expect(() =>
        buildRegistry(parseRunfile({ targets: [{ name: "a" }, { name: "a" }] }))
      ).toThrow(DuplicateTargetError);
    });

    it("fails on dangling prerequisites", () => {
      expect(() =>
        buildRegistry(parseRunfile({ targets: [{ name: "a", deps: ["b"] }] }))
      ).toThrow(UnknownTargetError);
    });

    it("adds release targets under their own section", () => {
      const registry = buildRegistry(
        parseRunfile({
          targets: [{ name: "test" }],
          release: {
            gate: ["test"],
            package: "npm pack",
            artifact: "dist/app-${version}.tgz",
            check: "npm publish --dry-run ${ARTIFACT}",
            uploader: { owner: "example-org", repo: "app" },
          },
        })
      );

      expect(registry.names()).toEqual([
        "test",
        "release-tag",
        "release-push",
        "release-package",
        "release-check",
        "release-publish",
        "release",
      ]);
      expect(registry.lookup("release").prerequisites).toEqual(["test"]);
      expect(registry.lookup("release").section).toBe("Release");
    });

    it("fails when a release gate is not declared", () => {
      expect(() =>
        buildRegistry(
          parseRunfile({
            release: {
              gate: ["test"],
              package: "npm pack",
              artifact: "dist/app.tgz",
              check: "true",
              uploader: { owner: "o", repo: "r" },
            },
          })
        )
      ).toThrow("Unknown target 'test' (prerequisite of 'release')");
    });
  });

  describe("runfileVariables", () => {
    it("maps every variable form", () => {
      const runfile = parseRunfile({
        variables: {
          NAME: "app",
          DIRS: ["src", "tests"],
          CI: { value: "true", export: true },
          version: { shell: "cat VERSION" },
        },
      });

      expect(runfileVariables(runfile)).toEqual([
        { name: "NAME", value: { kind: "literal", value: "app" } },
        { name: "DIRS", value: { kind: "literal", value: ["src", "tests"] } },
        { exported: true, name: "CI", value: { kind: "literal", value: "true" } },
        { exported: false, name: "version", value: { command: "cat VERSION", kind: "derived" } },
      ]);
    });

    it("adds the release tag and artifact unless the runfile defines them", () => {
      const release = {
        package: "npm pack",
        artifact: "dist/app-${ver}.tgz",
        check: "test -f ${ARTIFACT}",
        tagPrefix: "release-",
        version: "ver",
        uploader: { owner: "example-org", repo: "app" },
      };

      expect(runfileVariables(parseRunfile({ release }))).toEqual([
        { name: "TAG", value: { kind: "literal", value: "release-${ver}" } },
        { name: "ARTIFACT", value: { kind: "literal", value: "dist/app-${ver}.tgz" } },
      ]);
      expect(runfileVariables(parseRunfile({ release, variables: { TAG: "nightly" } }))).toEqual([
        { name: "TAG", value: { kind: "literal", value: "nightly" } },
        { name: "ARTIFACT", value: { kind: "literal", value: "dist/app-${ver}.tgz" } },
      ]);
    });
  });

  describe("loadRunfile", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = mkdtempSync(join(os.tmpdir(), "makeway-runfile-"));
    });

    afterEach(() => {
      rmSync(tmpDir, { force: true, recursive: true });
    });

    it("reads and validates a file", async () => {
      const path = join(tmpDir, "runfile.json");
      writeFileSync(path, JSON.stringify({ default: "build", targets: [{ name: "build" }] }));

      const runfile = await loadRunfile(path);

      expect(runfile.default).toBe("build");
      expect(runfile.targets).toEqual([{ commands: [], deps: [], name: "build" }]);
    });

    it("fails for a missing file", async () => {
      await expect(loadRunfile(join(tmpDir, "nope.json"))).rejects.toBeInstanceOf(RunfileError);
    });

    it("fails for invalid JSON", async () => {
      const path = join(tmpDir, "runfile.json");
      writeFileSync(path, "{ not json");

      await expect(loadRunfile(path)).rejects.toThrow(`Invalid runfile ${path}`);
    });
  });
});
