import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  BufferStore,
  ConfigManager,
  Logger,
  ToolSystem,
  createCoreTools,
  createCoreToolSystem,
  createArgListToolList,
  createFunctionToolList,
  registerArgListTools,
  registerFunctionTools,
  toolContextFromSettings,
} from '../../src/index.js';

/**
 * Integration tests: configuration → tool context → tool system and hosts
 */
describe('Tool Flow Integration', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'edit-tools-flow-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should edit a file found by search, using configured settings', async () => {
    const configPath = join(testDir, 'config.json');
    await writeFile(configPath, JSON.stringify({ tools: { workingDirectory: testDir, commandTimeout: 2000 } }));
    const { config } = await new ConfigManager(configPath, {}).load();
    expect(config).toBeDefined();
    if (!config) return;

    await writeFile(join(testDir, 'app.ts'), 'export const greeting = "hello world";\n');

    const logPath = join(testDir, 'tools.log');
    const toolSystem = createCoreToolSystem(
      toolContextFromSettings(config.tools),
      new ToolSystem(new Logger({ level: 'debug', path: logPath }))
    );

    const found = await toolSystem.execute({ id: '1', name: 'GrepTool', arguments: { pattern: 'greeting' } });
    expect(found.output).toBe('app.ts:1:export const greeting = "hello world";');

    const edited = await toolSystem.execute({
      id: '2',
      name: 'Edit',
      arguments: { file_path: 'app.ts', old_string: 'hello world', new_string: 'hello there' },
    });
    expect(edited.output).toBe('Successfully edited app.ts');

    const viewed = await toolSystem.execute({ id: '3', name: 'View', arguments: { file_path: 'app.ts', limit: 1 } });
    expect(viewed.output).toBe('export const greeting = "hello there";');

    const shell = await toolSystem.execute({ id: '4', name: 'Bash', arguments: { command: 'cat app.ts' } });
    expect(shell.output).toBe('export const greeting = "hello there";\n');

    const logLines = (await readFile(logPath, 'utf-8')).trim().split('\n');
    expect(logLines.map((line) => JSON.parse(line).context.callId)).toEqual(['1', '2', '3', '4']);
  });

  it('should share buffers between both hosts', async () => {
    const buffers = new BufferStore();
    const descriptors = createCoreTools(
      toolContextFromSettings({ workingDirectory: testDir, shell: '/bin/sh', commandTimeout: 2000 }, buffers)
    );

    const functionHost = createFunctionToolList();
    const argListHost = createArgListToolList();
    registerFunctionTools(functionHost, descriptors);
    registerArgListTools(argListHost, descriptors);

    await functionHost.find('ReplaceBuffer')?.execute({ buffer_name: 'draft', content: 'first\nsecond' });
    const edit = await argListHost.find('EditBuffer')?.function('draft', 'second', 'third');
    const view = await functionHost.find('ViewBuffer')?.execute({ buffer_name: 'draft' });

    expect(edit).toBe('Successfully edited draft');
    expect(view).toBe('first\nthird');
    expect(buffers.list()).toEqual(['draft']);
  });
});
