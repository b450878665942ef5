import { describe, expect, it } from "vitest";
import { createReleaseTargets, RELEASE_SECTION, ReleaseConfig } from "../../release/targets";
import type { Target } from "../../types";

const config = ReleaseConfig.parse({
  artifact: "dist/app-${version}.tgz",
  check: "tar -tzf ${ARTIFACT}",
  gate: ["test"],
  package: "npm pack --pack-destination dist",
  uploader: { owner: "example-org", repo: "app" },
});

function byName(targets: Target[], name: string): Target | undefined {
  return targets.find((t) => t.name === name);
}

describe("ReleaseConfig", () => {
  it("fills defaults", () => {
    expect(config).toMatchObject({
      remote: "origin",
      tagPrefix: "v",
      uploader: { owner: "example-org", repo: "app", tool: "github-release" },
      version: "version",
    });
  });

  it("requires the package, artifact, check and uploader settings", () => {
    expect(ReleaseConfig.safeParse({ artifact: "a" }).success).toBe(false);
  });
});

describe("createReleaseTargets", () => {
  const targets = createReleaseTargets(config);

  it("creates the release targets in the Release section", () => {
    expect(targets.map((t) => t.name)).toEqual([
      "release-tag",
      "release-push",
      "release-package",
      "release-check",
      "release-publish",
      "release",
    ]);
    expect(targets.every((t) => t.section === RELEASE_SECTION && t.alwaysRun)).toBe(true);
  });

  it("deletes the tag before creating it", () => {
    expect(byName(targets, "release-tag")?.commands).toEqual([
      { argv: ["git", "tag", "-d", "${TAG}"], ignoreFailure: true, kind: "exec", silent: false, substitute: true },
      { argv: ["git", "tag", "${TAG}"], ignoreFailure: false, kind: "exec", silent: false, substitute: true },
    ]);
  });

  it("replaces the remote tag when pushing", () => {
    const push = byName(targets, "release-push");
    expect(push?.commands.map((c) => (c.kind === "exec" ? [c.argv.join(" "), c.ignoreFailure] : []))).toEqual([
      ["git push origin", false],
      ["git push origin :refs/tags/${TAG}", true],
      ["git push origin ${TAG}", false],
    ]);
  });

  it("validates the artifact after packaging it", () => {
    expect(byName(targets, "release-package")?.commands).toEqual([
      {
        ignoreFailure: false,
        kind: "shell",
        line: "npm pack --pack-destination dist",
        silent: false,
        substitute: true,
      },
    ]);
    expect(byName(targets, "release-check")?.prerequisites).toEqual(["release-package"]);
    expect(byName(targets, "release-publish")?.prerequisites).toEqual(["release-check"]);
  });

  it("creates the release idempotently and uploads with replace", () => {
    const publish = byName(targets, "release-publish");
    expect(publish?.commands.map((c) => (c.kind === "exec" ? [c.argv.join(" "), c.ignoreFailure] : []))).toEqual([
      ["github-release release --user example-org --repo app --tag ${TAG} --name ${TAG}", true],
      [
        "github-release upload --user example-org --repo app --tag ${TAG} --name app-${version}.tgz --file ${ARTIFACT} --replace",
        false,
      ],
    ]);
  });

  it("passes release notes and a custom asset name", () => {
    const custom = createReleaseTargets(
      ReleaseConfig.parse({ ...config, assetName: "app.tgz", notes: "Release ${TAG}" })
    );
    const publish = byName(custom, "release-publish");
    const [create, upload] = publish?.commands ?? [];

    expect(create?.kind === "exec" && create.argv.slice(-2)).toEqual(["--description", "Release ${TAG}"]);
    expect(upload?.kind === "exec" && upload.argv.includes("app.tgz")).toBe(true);
  });

  it("gates the release target and binds TAG and ARTIFACT", () => {
    const release = byName(targets, "release");
    expect(release?.prerequisites).toEqual(["test"]);
    expect(release?.description).toBe("Tag, push and publish a release");
    expect(release?.commands).toEqual([
      {
        ignoreFailure: false,
        kind: "invoke",
        targets: ["release-tag", "release-push", "release-publish"],
        variables: { ARTIFACT: "dist/app-${version}.tgz", TAG: "v${version}" },
      },
    ]);
  });

  it("uses the configured version variable, prefix and remote", () => {
    const custom = createReleaseTargets(
      ReleaseConfig.parse({ ...config, remote: "upstream", tagPrefix: "release-", version: "VERSION" })
    );

    const release = byName(custom, "release")?.commands[0];
    expect(release?.kind === "invoke" && release.variables.TAG).toBe("release-${VERSION}");
    const push = byName(custom, "release-push")?.commands[0];
    expect(push?.kind === "exec" && push.argv).toEqual(["git", "push", "upstream"]);
  });
});
