import path from 'path';
import {
  checkHiddenImport,
  executableFileName,
  ExecutableBuilder,
  type ExecutableBuilderOptions,
} from '../../src/builders/executable-builder.js';
import type { ToolInvocation, ToolRunner } from '../../src/builders/tool-runner.js';
import type { BuildTarget } from '../../src/types.js';
import { fakeToolRunner, silentLogger, tempDir, toolResult, versionTag, writeFile } from '../helpers/fakes.js';

const linux: BuildTarget = { name: 'exe-linux', kind: 'executable', platform: 'linux' };
const windows: BuildTarget = { name: 'exe-windows', kind: 'executable', platform: 'windows' };

function sourceTree(): string {
  const root = tempDir('exe');
  writeFile(root, 'src/usage_monitor/__init__.py');
  writeFile(root, 'src/usage_monitor/__main__.py', 'print("hi")\n');
  writeFile(root, 'src/usage_monitor/display/dashboard.py');
  writeFile(root, 'src/usage_monitor/templates/index.html', '<html></html>');
  return root;
}

function argAfter(invocation: ToolInvocation, flag: string): string {
  return invocation.args[invocation.args.indexOf(flag) + 1];
}

function freezerWriting(fileName: string) {
  return fakeToolRunner(invocation => {
    writeFile(argAfter(invocation, '--distpath'), fileName, 'binary');
    return toolResult();
  });
}

function context() {
  return { version: versionTag('v2.3.0'), signal: new AbortController().signal, logger: silentLogger() };
}

function builder(runTool: ToolRunner, overrides: Partial<ExecutableBuilderOptions> = {}) {
  return new ExecutableBuilder({
    name: 'usage-monitor',
    entry: 'src/usage_monitor/__main__.py',
    dataPaths: [{ source: 'src/usage_monitor/templates', dest: 'usage_monitor/templates' }],
    hiddenImports: ['usage_monitor.display.dashboard', 'engineio.async_drivers.threading'],
    freezeCommand: ['pyinstaller'],
    distDir: 'build/executables',
    runTool,
    ...overrides,
  });
}

describe('checkHiddenImport', () => {
  test('accepts local modules that exist and third-party modules', async () => {
    const root = sourceTree();
    await expect(checkHiddenImport(root, 'usage_monitor.display.dashboard')).resolves.toBeNull();
    await expect(checkHiddenImport(root, 'usage_monitor.display')).resolves.toBeNull();
    await expect(checkHiddenImport(root, 'engineio.async_drivers.threading')).resolves.toBeNull();
  });

  test('rejects local modules that are missing', async () => {
    const root = sourceTree();
    await expect(checkHiddenImport(root, 'usage_monitor.missing')).resolves.toBe(
      'usage_monitor.missing is not present under src'
    );
  });

  test('rejects names that are not dotted module names', async () => {
    await expect(checkHiddenImport(tempDir('exe-name'), 'bad name')).resolves.toBe(
      '"bad name" is not a dotted module name'
    );
  });
});

describe('executableFileName', () => {
  test('adds .exe only for Windows platforms', () => {
    expect(executableFileName('usage-monitor', 'windows')).toBe('usage-monitor.exe');
    expect(executableFileName('usage-monitor', 'linux')).toBe('usage-monitor');
    expect(executableFileName('usage-monitor', undefined)).toBe('usage-monitor');
  });
});

describe('ExecutableBuilder', () => {
  test('freezes the entry script with data paths and hidden imports', async () => {
    const root = sourceTree();
    const runner = freezerWriting('usage-monitor');

    const artifact = await builder(runner.run).build(linux, { root }, context());

    const distPath = path.resolve(root, 'build/executables', 'exe-linux');
    const workPath = path.resolve(root, 'build/executables', '.work', 'exe-linux');
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].command).toBe('pyinstaller');
    expect(runner.calls[0].args).toEqual([
      '--noconfirm',
      '--onefile',
      '--name',
      'usage-monitor',
      '--distpath',
      distPath,
      '--workpath',
      workPath,
      '--specpath',
      workPath,
      '--add-data',
      `${path.resolve(root, 'src/usage_monitor/templates')}:usage_monitor/templates`,
      '--hidden-import',
      'usage_monitor.display.dashboard',
      '--hidden-import',
      'engineio.async_drivers.threading',
      path.resolve(root, 'src/usage_monitor/__main__.py'),
    ]);
    expect(artifact.produced).toBe(true);
    expect(artifact.handle.files).toEqual([path.join(distPath, 'usage-monitor')]);
  });

  test('uses the Windows separator and file name', async () => {
    const root = sourceTree();
    const runner = freezerWriting('usage-monitor.exe');

    const artifact = await builder(runner.run).build(windows, { root }, context());

    expect(argAfter(runner.calls[0], '--add-data')).toBe(
      `${path.resolve(root, 'src/usage_monitor/templates')};usage_monitor/templates`
    );
    expect(artifact.handle.files).toEqual([
      path.join(path.resolve(root, 'build/executables', 'exe-windows'), 'usage-monitor.exe'),
    ]);
  });

  test('runs the freezer through the target command prefix', async () => {
    const root = sourceTree();
    const runner = freezerWriting('usage-monitor');

    await builder(runner.run, { commandPrefixes: { 'exe-linux': ['docker-run-builder', '--arch', 'x86_64'] } }).build(
      linux,
      { root },
      context()
    );

    expect(runner.calls[0].command).toBe('docker-run-builder');
    expect(runner.calls[0].args.slice(0, 4)).toEqual(['--arch', 'x86_64', 'pyinstaller', '--noconfirm']);
  });

  test('fails before freezing when a declared data path is missing', async () => {
    const root = sourceTree();
    const runner = freezerWriting('usage-monitor');

    const artifact = await builder(runner.run, {
      dataPaths: [{ source: 'src/usage_monitor/static', dest: 'usage_monitor/static' }],
    }).build(linux, { root }, context());

    expect(runner.calls).toHaveLength(0);
    expect(artifact.produced).toBe(false);
    expect(artifact.error).toEqual({
      kind: 'BuildFailure',
      code: 'missing_data_path',
      message: 'Declared data path src/usage_monitor/static does not exist',
      detail: { path: 'src/usage_monitor/static' },
    });
  });

  test('fails before freezing when the entry script is missing', async () => {
    const root = sourceTree();
    const runner = freezerWriting('usage-monitor');

    const artifact = await builder(runner.run, { entry: 'src/usage_monitor/cli.py' }).build(linux, { root }, context());

    expect(runner.calls).toHaveLength(0);
    expect(artifact.error?.code).toBe('missing_data_path');
    expect(artifact.error?.message).toBe('Entry script src/usage_monitor/cli.py does not exist');
  });

  test('fails before freezing when a local hidden import is missing', async () => {
    const root = sourceTree();
    const runner = freezerWriting('usage-monitor');

    const artifact = await builder(runner.run, { hiddenImports: ['usage_monitor.analyzers.tokens'] }).build(
      linux,
      { root },
      context()
    );

    expect(runner.calls).toHaveLength(0);
    expect(artifact.error?.code).toBe('unresolved_hidden_import');
    expect(artifact.error?.message).toBe(
      'Hidden import cannot be resolved: usage_monitor.analyzers.tokens is not present under src'
    );
  });

  test('maps a failing freezer to tool_error', async () => {
    const root = sourceTree();
    const runner = fakeToolRunner(() => toolResult({ exitCode: 2, stdoutTail: 'ERROR: Spec file not found\n' }));

    const artifact = await builder(runner.run).build(linux, { root }, context());

    expect(artifact.error?.code).toBe('tool_error');
    expect(artifact.error?.message).toBe('pyinstaller ended with exit code 2: ERROR: Spec file not found');
  });

  test('reports a freezer that exits cleanly without output', async () => {
    const root = sourceTree();
    const runner = fakeToolRunner(() => toolResult());

    const artifact = await builder(runner.run).build(linux, { root }, context());

    expect(artifact.error?.code).toBe('missing_distribution');
    expect(artifact.error?.message).toBe('Freezer finished but usage-monitor was not produced');
  });
});
