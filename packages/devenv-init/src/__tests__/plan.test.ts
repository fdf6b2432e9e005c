import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { DEFAULT_META_PACKAGE, resolvePlan, type InitOptions } from '../plan.js';
import { resolveProjectConfig, type ProjectConfig } from '../project.js';

let tmpDir: string;
let config: ProjectConfig;

const defaults: InitOptions = {
  cleanInstall: false,
  skipDbImport: false,
  metaPackage: DEFAULT_META_PACKAGE,
};

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'devenv-plan-test-'));
  config = resolveProjectConfig({ TRAEFIK_DOMAIN: 'shop.test', TRAEFIK_SUBDOMAIN: 'app' });
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function addComposerJson(): void {
  fs.writeFileSync(path.join(tmpDir, 'composer.json'), '{}');
}

describe('resolvePlan', () => {
  it('imports the database for an existing project', async () => {
    addComposerJson();
    const plan = await resolvePlan(defaults, config, tmpDir);
    expect(plan).toEqual({
      cleanInstall: false,
      dbImport: true,
      createProject: false,
      metaPackage: 'magento/project-community-edition',
      metaVersion: '',
      dbDump: './backfill/magento-db.sql.gz',
      requiredFiles: ['./auth.json', './backfill/magento-db.sql.gz', './app/etc/env.php.warden.php'],
      warnings: [],
    });
  });

  it('implies a clean install when composer.json is missing', async () => {
    const plan = await resolvePlan(defaults, config, tmpDir);
    expect(plan.cleanInstall).toBe(true);
    expect(plan.dbImport).toBe(false);
    expect(plan.createProject).toBe(true);
    expect(plan.requiredFiles).toEqual(['./auth.json', './app/etc/env.php.init.php']);
    expect(plan.warnings).toEqual(['Implying --clean-install since file ./composer.json not present']);
  });

  it('honours an explicit clean install over existing code', async () => {
    addComposerJson();
    const plan = await resolvePlan({ ...defaults, cleanInstall: true }, config, tmpDir);
    expect(plan.cleanInstall).toBe(true);
    expect(plan.dbImport).toBe(false);
    expect(plan.createProject).toBe(false);
    expect(plan.warnings).toEqual([]);
  });

  it('skips the dump requirement with --skip-db-import', async () => {
    addComposerJson();
    const plan = await resolvePlan({ ...defaults, skipDbImport: true }, config, tmpDir);
    expect(plan.cleanInstall).toBe(false);
    expect(plan.dbImport).toBe(false);
    expect(plan.requiredFiles).toEqual(['./auth.json']);
  });

  it('prefers --db-dump over the configured dump', async () => {
    addComposerJson();
    const plan = await resolvePlan({ ...defaults, dbDump: './dumps/staging.sql.gz' }, config, tmpDir);
    expect(plan.dbDump).toBe('./dumps/staging.sql.gz');
    expect(plan.requiredFiles).toContain('./dumps/staging.sql.gz');
  });

  it('looks for composer.json below the web root', async () => {
    addComposerJson();
    const nested = { ...config, webRoot: './webroot' };
    const plan = await resolvePlan({ ...defaults, metaVersion: '2.4.x' }, nested, tmpDir);
    expect(plan.createProject).toBe(true);
    expect(plan.metaVersion).toBe('2.4.x');
    expect(plan.requiredFiles).toEqual(['./webroot/auth.json', './webroot/app/etc/env.php.init.php']);
  });
});
