import fs from 'fs/promises';
import path from 'path';
import { buildFailure, describeError } from '../errors/error-info.js';
import { isWindowsPlatform, type DataPath } from '../config/release-config.js';
import type { BuildArtifact, BuildTarget, ErrorInfo, SourceTree } from '../types.js';
import { failedArtifact, producedArtifact, type ArtifactBuilder, type BuildContext } from './types.js';
import { spawnTool, toolFailure, type ToolInvocation, type ToolRunner } from './tool-runner.js';

export interface ExecutableBuilderOptions {
  name: string;
  entry: string;
  dataPaths: DataPath[];
  hiddenImports: string[];
  freezeCommand: string[];
  distDir: string;
  /** Wrapper command per target name, e.g. a container or cross-arch launcher. */
  commandPrefixes?: Record<string, string[]>;
  runTool?: ToolRunner;
}

const MODULE_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

async function exists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check a hidden import before the freezer sees it. Modules whose top-level
 * package lives in the source tree must exist there; third-party modules
 * can only be checked for shape without an interpreter.
 */
export async function checkHiddenImport(root: string, moduleName: string): Promise<string | null> {
  if (!MODULE_NAME.test(moduleName)) {
    return `"${moduleName}" is not a dotted module name`;
  }

  const parts = moduleName.split('.');
  for (const base of [root, path.join(root, 'src')]) {
    if (!(await exists(path.join(base, parts[0])))) {
      continue;
    }
    const modulePath = path.join(base, ...parts);
    if ((await exists(modulePath)) || (await exists(`${modulePath}.py`))) {
      return null;
    }
    return `${moduleName} is not present under ${path.relative(root, base) || '.'}`;
  }

  return null;
}

export function executableFileName(name: string, platform: string | undefined): string {
  return isWindowsPlatform(platform) ? `${name}.exe` : name;
}

export class ExecutableBuilder implements ArtifactBuilder {
  readonly kind = 'executable' as const;
  private readonly runTool: ToolRunner;

  constructor(private readonly options: ExecutableBuilderOptions) {
    this.runTool = options.runTool ?? spawnTool;
  }

  async build(target: BuildTarget, source: SourceTree, context: BuildContext): Promise<BuildArtifact> {
    try {
      const problem = await this.validateInputs(source.root);
      if (problem) {
        context.logger.warn('executable_build', 'Declared build inputs are invalid', {
          target: target.name,
          code: problem.code,
        });
        return failedArtifact(target, problem);
      }
      return await this.freeze(target, source, context);
    } catch (error) {
      context.logger.error('executable_build', 'Executable build raised unexpectedly', {
        target: target.name,
        error: describeError(error),
      });
      return failedArtifact(target, buildFailure('unexpected_error', describeError(error)));
    }
  }

  private async validateInputs(root: string): Promise<ErrorInfo | null> {
    const entry = path.resolve(root, this.options.entry);
    if (!(await exists(entry))) {
      return buildFailure('missing_data_path', `Entry script ${this.options.entry} does not exist`, {
        path: this.options.entry,
      });
    }

    for (const dataPath of this.options.dataPaths) {
      if (!(await exists(path.resolve(root, dataPath.source)))) {
        return buildFailure('missing_data_path', `Declared data path ${dataPath.source} does not exist`, {
          path: dataPath.source,
        });
      }
    }

    for (const moduleName of this.options.hiddenImports) {
      const reason = await checkHiddenImport(root, moduleName);
      if (reason) {
        return buildFailure('unresolved_hidden_import', `Hidden import cannot be resolved: ${reason}`, {
          module: moduleName,
        });
      }
    }

    return null;
  }

  private async freeze(target: BuildTarget, source: SourceTree, context: BuildContext): Promise<BuildArtifact> {
    const root = source.root;
    const distPath = path.resolve(root, this.options.distDir, target.name);
    const workPath = path.resolve(root, this.options.distDir, '.work', target.name);
    const separator = isWindowsPlatform(target.platform) ? ';' : ':';

    await fs.rm(distPath, { recursive: true, force: true });
    await fs.mkdir(distPath, { recursive: true });

    const [freezer, ...freezerArgs] = this.options.freezeCommand;
    const freezeArgs = [
      ...freezerArgs,
      '--noconfirm',
      '--onefile',
      '--name',
      this.options.name,
      '--distpath',
      distPath,
      '--workpath',
      workPath,
      '--specpath',
      workPath,
      ...this.options.dataPaths.flatMap(dataPath => [
        '--add-data',
        `${path.resolve(root, dataPath.source)}${separator}${dataPath.dest}`,
      ]),
      ...this.options.hiddenImports.flatMap(moduleName => ['--hidden-import', moduleName]),
      path.resolve(root, this.options.entry),
    ];

    const prefix = this.options.commandPrefixes?.[target.name] ?? [];
    const invocation: ToolInvocation =
      prefix.length > 0
        ? { command: prefix[0], args: [...prefix.slice(1), freezer, ...freezeArgs], cwd: root, signal: context.signal }
        : { command: freezer, args: freezeArgs, cwd: root, signal: context.signal };

    context.logger.info('executable_build', 'Freezing application', {
      target: target.name,
      platform: target.platform,
      dataPaths: this.options.dataPaths.length,
      hiddenImports: this.options.hiddenImports.length,
    });

    const result = await this.runTool(invocation);
    const failure = toolFailure(result, invocation);
    if (failure) {
      const code = failure.code === 'nonzero_exit' ? 'tool_error' : failure.code;
      return failedArtifact(target, buildFailure(code, failure.message, failure.detail));
    }

    const executable = path.join(distPath, executableFileName(this.options.name, target.platform));
    if (!(await exists(executable))) {
      return failedArtifact(
        target,
        buildFailure('missing_distribution', `Freezer finished but ${path.basename(executable)} was not produced`, {
          distPath,
        })
      );
    }

    return producedArtifact(target, [executable]);
  }
}
