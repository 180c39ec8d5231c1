import { existsSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';

import { readConfigFile, resolveConfig } from '../config.js';
import { CommandError, ConfigError } from '../errors.js';
import { MemoryLogger } from './mocks.js';

const testDir = join(__dirname, 'temp-config-test');

beforeAll(() => {
  if (!existsSync(testDir)) {
    mkdirSync(testDir, { recursive: true });
  }
});

afterAll(() => {
  if (existsSync(testDir)) {
    rmSync(testDir, { recursive: true });
  }
});

describe('readConfigFile', () => {
  beforeEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    mkdirSync(testDir, { recursive: true });
  });

  it('should resolve directories against the config file', async () => {
    const configFile = join(testDir, '.strings-po.json');
    writeFileSync(configFile, JSON.stringify({ android: 'app/res', gettext: 'po', ignore: ['debug_'] }));

    const config = await readConfigFile(configFile);

    expect(config).toEqual({
      android: join(testDir, 'app', 'res'),
      gettext: join(testDir, 'po'),
      ignore: ['debug_'],
    });
  });

  it('should reject unknown keys', async () => {
    const configFile = join(testDir, '.strings-po.json');
    writeFileSync(configFile, JSON.stringify({ androidDir: 'res' }));

    await expect(readConfigFile(configFile)).rejects.toThrow(ConfigError);
  });

  it('should reject a template that is neither a name nor false', async () => {
    const configFile = join(testDir, '.strings-po.json');
    writeFileSync(configFile, JSON.stringify({ template: true }));

    await expect(readConfigFile(configFile)).rejects.toThrow(/^Invalid config file .*template/);
  });

  it('should reject malformed JSON', async () => {
    const configFile = join(testDir, '.strings-po.json');
    writeFileSync(configFile, '{ "android": ');

    await expect(readConfigFile(configFile)).rejects.toThrow(/^Error reading config file /);
  });
});

describe('resolveConfig', () => {
  const projectDir = join(testDir, 'project');

  beforeEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    mkdirSync(join(projectDir, 'src', 'main'), { recursive: true });
    writeFileSync(join(projectDir, 'AndroidManifest.xml'), '<manifest/>');
  });

  it('should default to the directories beside the manifest', async () => {
    const config = await resolveConfig({}, join(projectDir, 'src', 'main'), new MemoryLogger());

    expect(config).toEqual({
      resourceDir: join(projectDir, 'res'),
      gettextDir: join(projectDir, 'locale'),
      ignore: [],
      template: 'template.pot',
      sourceLanguage: 'en',
    });
  });

  it('should let command-line options override the config file', async () => {
    writeFileSync(
      join(projectDir, '.strings-po.json'),
      JSON.stringify({ android: 'app/res', gettext: 'po', ignore: ['a'], template: '%s.pot', sourceLanguage: 'de' })
    );
    const logger = new MemoryLogger();

    const config = await resolveConfig(
      { android: 'other/res', ignore: ['/^b/'], sourceLanguage: 'pt-rBR' },
      projectDir,
      logger
    );

    expect(config).toEqual({
      resourceDir: join(projectDir, 'other', 'res'),
      gettextDir: join(projectDir, 'po'),
      ignore: ['a', '/^b/'],
      template: 'strings.pot',
      sourceLanguage: 'pt_BR',
    });
    expect(logger.debugs).toContain(`Using auto-detected config file: ${join(projectDir, '.strings-po.json')}`);
  });

  it('should turn off the template with --no-template', async () => {
    const config = await resolveConfig({ template: false }, projectDir, new MemoryLogger());

    expect(config.template).toBe(false);
  });

  it('should use an explicitly given config file', async () => {
    const configFile = join(testDir, 'custom.json');
    writeFileSync(configFile, JSON.stringify({ android: 'res', gettext: 'locale' }));

    const config = await resolveConfig({ config: configFile }, testDir, new MemoryLogger());

    expect(config.resourceDir).toBe(join(testDir, 'res'));
    expect(config.gettextDir).toBe(join(testDir, 'locale'));
  });

  it('should fail outside of a project', async () => {
    const outside = join(testDir, 'elsewhere');
    mkdirSync(outside, { recursive: true });

    await expect(resolveConfig({}, outside, new MemoryLogger())).rejects.toThrow(CommandError);
  });

  it('should reject an invalid ignore pattern', async () => {
    await expect(resolveConfig({ ignore: ['/(/'] }, projectDir, new MemoryLogger())).rejects.toThrow(
      /^Invalid ignore pattern \/\(\//
    );
  });

  it('should reject an invalid source language', async () => {
    await expect(resolveConfig({ sourceLanguage: 'english' }, projectDir, new MemoryLogger())).rejects.toThrow(
      'Invalid source language: english'
    );
  });
});
