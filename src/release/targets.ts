import { posix } from "node:path";
import { z } from "zod";
import type { TargetCommand, Target, Variable } from "../types";

export const RELEASE_SECTION = "Release";

export const ReleaseTargetName = {
  check: "release-check",
  package: "release-package",
  publish: "release-publish",
  push: "release-push",
  release: "release",
  tag: "release-tag",
} as const;

export const ReleaseConfig = z
  .object({
    version: z.string().default("version").describe("variable holding the version string"),
    tagPrefix: z.string().default("v"),
    remote: z.string().default("origin"),
    gate: z.array(z.string()).default([]).describe("targets that must pass before releasing"),
    package: z.string().min(1).describe("command that builds the artifact"),
    artifact: z.string().min(1).describe("artifact path, may reference ${version}"),
    check: z.string().min(1).describe("command that validates ${ARTIFACT} before upload"),
    assetName: z.string().optional(),
    notes: z.string().optional().describe("release description"),
    uploader: z
      .object({
        tool: z.string().default("github-release"),
        owner: z.string().min(1),
        repo: z.string().min(1),
      })
      .strict(),
  })
  .strict();
export type ReleaseConfig = z.infer<typeof ReleaseConfig>;

function tagOf(config: ReleaseConfig): string {
  return `${config.tagPrefix}\${${config.version}}`;
}

export function releaseVariables(config: ReleaseConfig): Variable[] {
  return [
    { name: "TAG", value: { kind: "literal", value: tagOf(config) } },
    { name: "ARTIFACT", value: { kind: "literal", value: config.artifact } },
  ];
}

function exec(argv: string[], ignoreFailure = false): TargetCommand {
  return { argv, ignoreFailure, kind: "exec", silent: false, substitute: true };
}

function shell(line: string): TargetCommand {
  return { ignoreFailure: false, kind: "shell", line, silent: false, substitute: true };
}

function target(
  name: string,
  commands: TargetCommand[],
  extra: Partial<Pick<Target, "prerequisites" | "description">> = {}
): Target {
  return {
    alwaysRun: true,
    commands,
    name,
    prerequisites: extra.prerequisites ?? [],
    section: RELEASE_SECTION,
    ...(extra.description !== undefined && { description: extra.description }),
  };
}

/**
 * The release workflow as ordinary targets. Every step that touches
 * existing remote or local state first clears it (delete-then-create) or
 * replaces it (upload --replace), so re-running after a partial failure
 * converges.
 *
 * The step targets read `TAG` and `ARTIFACT`. The `release` target binds
 * them when it invokes the steps; {@link releaseVariables} defines them at
 * the root so each step also runs on its own.
 */
export function createReleaseTargets(config: ReleaseConfig): Target[] {
  const { owner, repo, tool } = config.uploader;
  const assetName = config.assetName ?? posix.basename(config.artifact);
  const notes = config.notes !== undefined ? ["--description", config.notes] : [];

  return [
    target(ReleaseTargetName.tag, [
      exec(["git", "tag", "-d", "${TAG}"], true),
      exec(["git", "tag", "${TAG}"]),
    ]),
    target(ReleaseTargetName.push, [
      exec(["git", "push", config.remote]),
      exec(["git", "push", config.remote, ":refs/tags/${TAG}"], true),
      exec(["git", "push", config.remote, "${TAG}"]),
    ]),
    target(ReleaseTargetName.package, [shell(config.package)], {
      description: "Build the distributable artifact",
    }),
    target(ReleaseTargetName.check, [shell(config.check)], {
      description: "Validate the artifact before upload",
      prerequisites: [ReleaseTargetName.package],
    }),
    target(
      ReleaseTargetName.publish,
      [
        exec(
          [tool, "release", "--user", owner, "--repo", repo, "--tag", "${TAG}", "--name", "${TAG}", ...notes],
          true
        ),
        exec([
          tool,
          "upload",
          "--user",
          owner,
          "--repo",
          repo,
          "--tag",
          "${TAG}",
          "--name",
          assetName,
          "--file",
          "${ARTIFACT}",
          "--replace",
        ]),
      ],
      { prerequisites: [ReleaseTargetName.check] }
    ),
    target(
      ReleaseTargetName.release,
      [
        {
          ignoreFailure: false,
          kind: "invoke",
          targets: [ReleaseTargetName.tag, ReleaseTargetName.push, ReleaseTargetName.publish],
          variables: {
            ARTIFACT: config.artifact,
            TAG: tagOf(config),
          },
        },
      ],
      {
        description: "Tag, push and publish a release",
        prerequisites: config.gate,
      }
    ),
  ];
}
