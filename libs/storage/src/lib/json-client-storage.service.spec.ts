import { LoggerService } from '@client-registry/logger';
import { ALICE, BENSON, BOB, ClientBuilder } from '@client-registry/model/testing';
import { InMemoryFileSystem } from '../testing';
import { JsonClientStorage } from './json-client-storage.service';
import { StorageError } from './storage-error';

const DATA_FILE = 'data/clients.json';

describe('JsonClientStorage', () => {
  let fileSystem: InMemoryFileSystem;
  let logLines: Array<Record<string, unknown>>;
  let storage: JsonClientStorage;

  const record = (overrides: Record<string, unknown> = {}) => ({
    name: 'Alice Pauline',
    phone: '94351253',
    email: 'alice@example.com',
    address: '123, Jurong West Ave 6, #08-111',
    tags: ['friends'],
    ...overrides,
  });

  beforeEach(() => {
    fileSystem = new InMemoryFileSystem();
    logLines = [];
    const logger = new LoggerService({
      level: 'info',
      stream: { write: (line: string) => logLines.push(JSON.parse(line)) },
    });
    storage = new JsonClientStorage(DATA_FILE, logger, fileSystem);
  });

  describe('loadClients', () => {
    it('should start empty when the file is missing', async () => {
      await expect(storage.loadClients()).resolves.toEqual([]);
      expect(logLines.map((line) => line['msg'])).toEqual([
        'No data file found, starting with an empty registry',
      ]);
    });

    it('should build clients from valid records', async () => {
      fileSystem.files.set(
        DATA_FILE,
        JSON.stringify({
          clients: [
            record({ productPreference: { label: 'Shampoo', frequency: 7 }, priority: 3 }),
            record({
              name: 'Benson Meier',
              phone: '98765432',
              email: 'johnd@example.com',
              address: '311, Clementi Ave 2, #02-25',
              tags: ['owesMoney', 'friends'],
              productPreference: { label: 'Green Tea', frequency: 3 },
            }),
          ],
        }),
      );

      const clients = await storage.loadClients();

      expect(clients).toHaveLength(2);
      expect(clients[0].equals(ALICE)).toBe(true);
      expect(clients[1].equals(BENSON)).toBe(true);
    });

    it('should treat a blank description as none', async () => {
      fileSystem.files.set(DATA_FILE, JSON.stringify({ clients: [record({ description: '  ' })] }));
      const [client] = await storage.loadClients();
      expect(client.description).toBeUndefined();
    });

    it('should start empty and warn when the file is not JSON', async () => {
      fileSystem.files.set(DATA_FILE, '{ "clients": [');

      await expect(storage.loadClients()).resolves.toEqual([]);
      expect(logLines).toHaveLength(1);
      expect(logLines[0]['level']).toBe(40);
      expect(logLines[0]['msg']).toBe('Data file is not valid JSON, starting with an empty registry');
    });

    it('should start empty when a record breaks a field rule', async () => {
      fileSystem.files.set(DATA_FILE, JSON.stringify({ clients: [record({ phone: '12345' })] }));

      await expect(storage.loadClients()).resolves.toEqual([]);
      expect(logLines[0]['msg']).toBe(
        'Data file does not match the client record format, starting with an empty registry',
      );
      expect(logLines[0]['issues']).toEqual([
        'clients.0.phone: Phone numbers should be exactly 8 digits, start with 3, 6, 8 or 9, and not start with 99',
      ]);
    });

    it('should start empty when the top-level shape is wrong', async () => {
      fileSystem.files.set(DATA_FILE, JSON.stringify([record()]));
      await expect(storage.loadClients()).resolves.toEqual([]);
    });

    it('should start empty when two records share an identity', async () => {
      fileSystem.files.set(
        DATA_FILE,
        JSON.stringify({ clients: [record(), record({ email: 'other@example.com', tags: [] })] }),
      );

      await expect(storage.loadClients()).resolves.toEqual([]);
      expect(logLines[0]['msg']).toBe('Data file holds duplicate clients, starting with an empty registry');
      expect(logLines[0]['client']).toBe('Alice Pauline');
    });
  });

  describe('saveClients', () => {
    it('should write the records as JSON', async () => {
      await storage.saveClients([BOB]);

      expect(JSON.parse(fileSystem.files.get(DATA_FILE) ?? '')).toEqual({
        clients: [
          {
            name: 'Bob Choo',
            phone: '82222222',
            email: 'bob@example.com',
            address: 'Block 123, Bobby Street 3',
            tags: ['friend', 'husband'],
            priority: 2,
          },
        ],
      });
    });

    it('should write optional fields when present', async () => {
      const client = new ClientBuilder().withProductPreference('Tea').withDescription('Calls on Fridays').build();
      await storage.saveClients([client]);

      const saved = JSON.parse(fileSystem.files.get(DATA_FILE) ?? '');
      expect(saved.clients[0].productPreference).toEqual({ label: 'Tea', frequency: 1 });
      expect(saved.clients[0].description).toBe('Calls on Fridays');
    });

    it('should load back what it saved', async () => {
      await storage.saveClients([ALICE, BOB]);
      const loaded = await storage.loadClients();
      expect(loaded.map((client, i) => client.equals([ALICE, BOB][i]))).toEqual([true, true]);
    });

    it('should reject with a StorageError when the write fails', async () => {
      fileSystem.failWritesWith = new Error('disk full');

      const error = await storage.saveClients([ALICE]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({
        message: 'Could not save data to file data/clients.json: disk full',
        filePath: DATA_FILE,
      });
    });
  });
});
