import { ErrorCode, TeleflushError } from "@teleflush/shared/errors";
import { execaSync } from "execa";

/** First six hex characters of the checked-out commit. */
export function gitShortRevision(cwd: string = process.cwd()): string {
  try {
    const { stdout } = execaSync("git", ["rev-parse", "HEAD"], { cwd });
    const revision = stdout.trim();
    if (!/^[0-9a-f]{6,}$/.test(revision)) {
      throw new Error(`unexpected git output: ${revision}`);
    }
    return revision.slice(0, 6);
  } catch (error) {
    throw new TeleflushError(
      ErrorCode.CONFIG.GIT_VERSION_UNAVAILABLE,
      "Could not read the git revision to use as version",
      400,
      { cause: error instanceof Error ? error.message : String(error) },
    );
  }
}
