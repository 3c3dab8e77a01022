import { join } from "node:path";

export type SandboxLanguage = "python" | "node";

/**
 * Commands used for one language. Overridable from config.
 */
export interface RuntimeCommands {
  /** Interpreter, e.g. "python3" or the path of the node binary */
  command: string;
  /** Package installer, e.g. "python3" (run as `-m pip`) or "npm" */
  installCommand: string;
}

export interface CommandLine {
  command: string;
  args: string[];
}

/**
 * How a language lays out, installs into and runs a sandbox directory.
 */
export interface SandboxRuntime {
  language: SandboxLanguage;
  scriptName: string;
  /** Directories that belong to the environment, never reported as outputs */
  environmentDirs: string[];
  isValidDependency(spec: string): boolean;
  install(dir: string, dependencies: string[]): CommandLine;
  run(dir: string): CommandLine;
  env(dir: string): Record<string, string>;
}

export const DEFAULT_RUNTIME_COMMANDS: Record<SandboxLanguage, RuntimeCommands> = {
  python: { command: "python3", installCommand: "python3" },
  node: { command: process.execPath, installCommand: "npm" },
};

const PYTHON_REQUIREMENT =
  /^[A-Za-z0-9][A-Za-z0-9._-]*(\[[A-Za-z0-9,._-]+\])?((==|>=|<=|~=|!=|<|>)[A-Za-z0-9.*+!_-]+)?$/;
const NPM_PACKAGE =
  /^(@[a-z0-9~][a-z0-9._~-]*\/)?[a-z0-9~][a-z0-9._~-]*(@[A-Za-z0-9.^~<>=*|_-]+)?$/;

const PYTHON_DEPS_DIR = ".deps";

export function createRuntime(
  language: SandboxLanguage,
  commands: RuntimeCommands = DEFAULT_RUNTIME_COMMANDS[language],
): SandboxRuntime {
  if (language === "python") {
    return {
      language,
      scriptName: "script.py",
      environmentDirs: [PYTHON_DEPS_DIR, "__pycache__", ".cache"],
      isValidDependency: (spec) => PYTHON_REQUIREMENT.test(spec),
      install: (dir, dependencies) => ({
        command: commands.installCommand,
        args: [
          "-m", "pip", "install",
          "--quiet", "--disable-pip-version-check", "--no-input",
          "--target", join(dir, PYTHON_DEPS_DIR),
          ...dependencies,
        ],
      }),
      run: (dir) => ({ command: commands.command, args: [join(dir, "script.py")] }),
      env: (dir) => ({
        PYTHONPATH: join(dir, PYTHON_DEPS_DIR),
        PYTHONDONTWRITEBYTECODE: "1",
        PYTHONUNBUFFERED: "1",
      }),
    };
  }

  return {
    language,
    scriptName: "script.mjs",
    environmentDirs: ["node_modules", ".npm"],
    isValidDependency: (spec) => NPM_PACKAGE.test(spec),
    install: (dir, dependencies) => ({
      command: commands.installCommand,
      args: [
        "install", "--prefix", dir,
        "--no-save", "--no-package-lock", "--no-audit", "--no-fund", "--ignore-scripts",
        ...dependencies,
      ],
    }),
    run: (dir) => ({ command: commands.command, args: [join(dir, "script.mjs")] }),
    env: (dir) => ({ NODE_PATH: join(dir, "node_modules") }),
  };
}
