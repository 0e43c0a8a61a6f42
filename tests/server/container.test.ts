import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { newDb } from 'pg-mem';
import { loadConfig } from '../../config/app-config';
import type { CatalogStore } from '../../core/contracts/catalog';
import { SchemaMismatchError } from '../../core/errors';
import { LocalCatalogStore } from '../../catalog/local-catalog-store';
import { PostgresCatalogStore } from '../../catalog/postgres-catalog-store';
import { buildContainer, indexSpecFor } from '../../server/container';
import type { ToolRegistry } from '../../tools/registry';
import { CATALOG_FILE, MODEL_FILE, fixedEmbedder } from '../helpers/fixtures';

describe('buildContainer', () => {
  let logSpy: jest.SpyInstance;
  let tmpDir: string;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    tmpDir = mkdtempSync(path.join(os.tmpdir(), 'catalog-container-'));
  });

  afterEach(() => {
    logSpy.mockRestore();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('ingests the catalog file into an in-memory store and freezes', async () => {
    const config = loadConfig({ CATALOG_FILE, EMBEDDING_MODEL_PATH: MODEL_FILE });

    const { container, cleanup } = await buildContainer(config);

    const store = container.resolve<CatalogStore>('catalogStore');
    expect(store).toBeInstanceOf(LocalCatalogStore);
    expect(await store.count()).toBe(16);
    expect(container.isFrozen()).toBe(true);
    expect(container.resolve<ToolRegistry>('toolRegistry').isLocked()).toBe(true);
    expect(container.resolve<ToolRegistry>('toolRegistry').list()).toEqual(['search_products']);
    expect(() => container.registerValue('extra', 1)).toThrow('Container is frozen');

    await cleanup();
  });

  it('fails when the embedder dimension differs from EMBEDDING_DIM', async () => {
    const config = loadConfig({ CATALOG_FILE, EMBEDDING_DIM: '8' });

    await expect(buildContainer(config, { embedder: fixedEmbedder([1, 0, 0]) })).rejects.toBeInstanceOf(SchemaMismatchError);
  });

  it('fails when the catalog file is missing', async () => {
    const missing = path.join(tmpDir, 'missing.json');
    const config = loadConfig({ CATALOG_FILE: missing, EMBEDDING_DIM: '3' });

    await expect(buildContainer(config, { embedder: fixedEmbedder([1, 0, 0]) })).rejects.toThrow('ENOENT');
  });

  it('refuses to start on a catalog with invalid records', async () => {
    const file = path.join(tmpDir, 'products.json');
    writeFileSync(file, JSON.stringify([
      { product_id: 1, name: 'Tent', description: 'Dome tent', category: 'Outdoor', price: 120, in_stock: true, brand: 'TrailForge' },
      { product_id: 2, name: 'Stove', description: 'Camp stove', category: 'Outdoor', price: -5, in_stock: true, brand: 'TrailForge' }
    ]));
    const config = loadConfig({ CATALOG_FILE: file, EMBEDDING_DIM: '3' });

    await expect(buildContainer(config, { embedder: fixedEmbedder([1, 0, 0]) })).rejects.toThrow(
      `Catalog ingestion from ${file} failed: 1 record(s) rejected (first: validation 2: record 1: price: Number must be greater than or equal to 0)`
    );
  });

  it('uses a Postgres store when a pool is supplied', async () => {
    const pg = newDb().adapters.createPg();
    const pool = new pg.Pool();
    const config = loadConfig({ CATALOG_FILE, EMBEDDING_DIM: '3' });

    const { container, cleanup } = await buildContainer(config, { pool, embedder: fixedEmbedder([1, 0, 0]) });

    const store = container.resolve<CatalogStore>('catalogStore');
    expect(store).toBeInstanceOf(PostgresCatalogStore);
    expect(await store.count()).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('[INFO] Catalog store holds 0 published products');

    await cleanup();
    await expect(store.count()).rejects.toThrow('Catalog store is closed');
  });

  it('derives the index spec from configuration', () => {
    const config = loadConfig({ INDEX_NLIST: '32' });

    expect(indexSpecFor(config)).toEqual({ metric: 'L2', kind: 'IVF_FLAT', params: { nlist: 32 } });
  });
});
