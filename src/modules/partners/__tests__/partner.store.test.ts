import fs from 'node:fs';
import fsp from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import logger from '../../../plugins/logger.js';
import { ConflictError, StoreUnavailableError } from '../../../shared/errors.js';
import { FilePartnerStore } from '../partner-file.store.js';
import { InMemoryPartnerStore } from '../partner.store.js';
import { partnerInput, square } from './fixtures.js';

describe('InMemoryPartnerStore', () => {
  it('assigns an id when the input has none', async () => {
    const store = new InMemoryPartnerStore({ generateId: () => 'gen-1' });
    const id = await store.save(partnerInput());
    expect(id).toBe('gen-1');
    const saved = await store.findById('gen-1');
    expect(saved?.id).toBe('gen-1');
    expect(saved?.tradingName).toBe('Adega Teste');
  });

  it('keeps a client supplied id', async () => {
    const store = new InMemoryPartnerStore();
    await expect(store.save(partnerInput({ id: 'p-1' }))).resolves.toBe('p-1');
    expect(await store.findById('missing')).toBeNull();
  });

  it('rejects duplicate ids and documents without changing the store', async () => {
    const store = new InMemoryPartnerStore();
    await store.save(partnerInput({ id: 'p-1', document: 'doc-1' }));

    const dupId = store.save(partnerInput({ id: 'p-1', document: 'doc-2' }));
    await expect(dupId).rejects.toBeInstanceOf(ConflictError);
    await expect(store.save(partnerInput({ id: 'p-1', document: 'doc-2' }))).rejects.toThrow('id already exists');
    await expect(store.save(partnerInput({ id: 'p-2', document: 'doc-1' }))).rejects.toThrow('document must be unique');

    expect(await store.count()).toBe(1);
    expect(await store.findById('p-2')).toBeNull();
  });

  it('returns covering candidates oldest first', async () => {
    const store = new InMemoryPartnerStore();
    await store.save(partnerInput({ id: 'second', document: 'doc-b' }));
    await store.save(partnerInput({ id: 'first', document: 'doc-a' }));
    await store.save(
      partnerInput({
        id: 'far',
        document: 'doc-c',
        coverageArea: { type: 'MultiPolygon', coordinates: [square(10, 10, 11, 11)] },
      })
    );

    const candidates = await store.findCandidates([-46.65, -23.55]);
    expect(candidates.map((p) => p.id)).toEqual(['second', 'first']);
  });
});

describe('FilePartnerStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'partners-'));
    filePath = path.join(dir, 'data', 'partners.json');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty without a data file and writes one on save', async () => {
    const store = await FilePartnerStore.open({ filePath, logger });
    expect(await store.count()).toBe(0);

    await store.save(partnerInput({ id: 'p-1' }));
    await store.close();

    const written = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    expect(written).toHaveLength(1);
    expect(written[0].id).toBe('p-1');
    expect(written[0].document).toBe('00.000.000/0001-01');
  });

  it('reloads saved partners and keeps them indexed', async () => {
    const first = await FilePartnerStore.open({ filePath, logger });
    await first.save(partnerInput({ id: 'p-1' }));
    await first.close();

    const reopened = await FilePartnerStore.open({ filePath, logger });
    expect((await reopened.findById('p-1'))?.ownerName).toBe('Maria Teste');
    expect((await reopened.findCandidates([-46.65, -23.55])).map((p) => p.id)).toEqual(['p-1']);
    await expect(reopened.save(partnerInput({ id: 'p-2' }))).rejects.toThrow('document must be unique');
  });

  it('starts empty when the data file is not valid JSON', async () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '{not json', 'utf8');
    const store = await FilePartnerStore.open({ filePath, logger });
    expect(await store.count()).toBe(0);
  });

  it('skips invalid and duplicate records', async () => {
    const valid = { ...partnerInput(), id: 'ok' };
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(
      filePath,
      JSON.stringify([valid, { id: 'broken', tradingName: 'x' }, { ...valid, id: 'dup' }]),
      'utf8'
    );
    const store = await FilePartnerStore.open({ filePath, logger });
    expect(await store.count()).toBe(1);
    expect(await store.findById('ok')).not.toBeNull();
  });

  it('rolls the insert back when the write fails', async () => {
    const store = await FilePartnerStore.open({ filePath, logger });
    // A directory where the temp file goes makes the write fail
    fs.mkdirSync(`${filePath}.tmp`, { recursive: true });

    await expect(store.save(partnerInput({ id: 'p-1' }))).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(await store.count()).toBe(0);
    expect(await store.findById('p-1')).toBeNull();

    fs.rmSync(`${filePath}.tmp`, { recursive: true });
    await expect(store.save(partnerInput({ id: 'p-1' }))).resolves.toBe('p-1');
    await store.close();
  });

  it('keeps a partner whose write failed out of the file when saves overlap', async () => {
    const store = await FilePartnerStore.open({ filePath, logger });
    const realRename = fsp.rename;
    jest
      .spyOn(fsp, 'rename')
      .mockImplementationOnce((from, to) => realRename(from, to))
      .mockImplementationOnce(async () => {
        throw new Error('disk full');
      });

    const results = await Promise.allSettled([
      store.save(partnerInput({ id: 'A', document: 'doc-a' })),
      store.save(partnerInput({ id: 'B', document: 'doc-b' })),
    ]);
    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
    expect(await store.findById('B')).toBeNull();
    await store.close();

    const written = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    expect(written.map((p: { id: string }) => p.id)).toEqual(['A']);

    const reopened = await FilePartnerStore.open({ filePath, logger });
    expect(await reopened.findById('A')).not.toBeNull();
    expect(await reopened.findById('B')).toBeNull();
  });

  it('hides a partner until its write lands but still reserves its id and document', async () => {
    const store = await FilePartnerStore.open({ filePath, logger });
    const pending = store.save(partnerInput({ id: 'A', document: 'doc-a' }));

    expect(await store.findById('A')).toBeNull();
    expect(await store.findCandidates([-46.65, -23.55])).toEqual([]);
    await expect(store.save(partnerInput({ id: 'A', document: 'doc-x' }))).rejects.toThrow('id already exists');
    await expect(store.save(partnerInput({ id: 'X', document: 'doc-a' }))).rejects.toThrow('document must be unique');

    await expect(pending).resolves.toBe('A');
    expect((await store.findById('A'))?.document).toBe('doc-a');
    await store.close();
  });
});
