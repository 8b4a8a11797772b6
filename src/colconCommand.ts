import type { PackageId } from "./types.js";
import type { Settings } from "./settings.js";

export type BuildOptions = Pick<Settings, "symlinkInstall" | "parallelWorkers" | "buildType">;

/**
 * argv for `colcon build` restricted to the given packages.
 * buildType "auto" leaves CMAKE_BUILD_TYPE to the packages' CMakeLists.
 */
export function buildColconCommand(options: BuildOptions, packages: readonly PackageId[]): string[] {
  if (packages.length === 0) {
    throw new Error("Select at least one package to build");
  }

  const argv = ["colcon", "build"];
  if (options.symlinkInstall) argv.push("--symlink-install");
  argv.push("--parallel-workers", String(options.parallelWorkers));
  if (options.buildType !== "auto") {
    argv.push("--cmake-args", `-DCMAKE_BUILD_TYPE=${options.buildType}`);
  }
  argv.push("--packages-select", ...packages);
  return argv;
}

const SAFE_ARG = /^[A-Za-z0-9_\-.,=/:@+]+$/;

function quoteArg(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Render argv as a single POSIX shell line. */
export function formatCommand(argv: readonly string[]): string {
  return argv.map(quoteArg).join(" ");
}

/**
 * Shell line that opens a file with the platform's default handler.
 * Windows `start` takes its first quoted argument as the window title, hence the empty one.
 */
export function openCommand(file: string, platform: NodeJS.Platform): string {
  const quoted = JSON.stringify(file);
  if (platform === "darwin") return `open ${quoted}`;
  if (platform === "win32") return `start "" ${quoted}`;
  return `xdg-open ${quoted}`;
}
