import * as fs from 'fs';
import * as path from 'path';
import { makeTempDir, removeDir } from '../testUtils/fakes';
import { InMemoryRepository, JsonFileRepository, reviveDates } from './repository';

interface Note {
  id: string;
  tags: string[];
  createdAt: Date;
  closedAt?: Date;
}

const NOTE: Note = { id: 'note-1', tags: ['a'], createdAt: new Date('2030-01-01T09:00:00.000Z') };

describe('InMemoryRepository', () => {
  it('stores copies so callers cannot change stored records', async () => {
    const repository = new InMemoryRepository<Note>();
    const note = structuredClone(NOTE);

    await repository.put(note.id, note);
    note.tags.push('changed');
    const loaded = await repository.get(note.id);
    loaded?.tags.push('changed again');

    expect(await repository.get(note.id)).toEqual(NOTE);
  });

  it('lists and deletes records', async () => {
    const repository = new InMemoryRepository<Note>();
    await repository.put('note-1', NOTE);
    await repository.put('note-2', { ...NOTE, id: 'note-2' });

    expect((await repository.list()).map(note => note.id)).toEqual(['note-1', 'note-2']);
    expect(await repository.delete('note-1')).toBe(true);
    expect(await repository.delete('note-1')).toBe(false);
    expect(await repository.get('note-1')).toBeUndefined();
  });
});

describe('JsonFileRepository', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('repository');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('round-trips records with their dates', async () => {
    const repository = new JsonFileRepository<Note>(path.join(dir, 'notes'), 'NoteStore');
    const note: Note = { ...NOTE, closedAt: new Date('2030-01-02T10:30:00.500Z') };

    await repository.put(note.id, note);
    const reopened = new JsonFileRepository<Note>(path.join(dir, 'notes'), 'NoteStore');

    const loaded = await reopened.get(note.id);
    expect(loaded).toEqual(note);
    expect(loaded?.createdAt).toBeInstanceOf(Date);
    expect(fs.existsSync(path.join(dir, 'notes', 'note-1.json.tmp'))).toBe(false);
  });

  it('refuses ids that could escape the directory', async () => {
    const repository = new JsonFileRepository<Note>(dir, 'NoteStore');

    await expect(repository.put('../outside', NOTE)).rejects.toThrow('[NoteStore] Invalid record id: ../outside');
  });

  it('reads ids that could never be stored as missing', async () => {
    const repository = new JsonFileRepository<Note>(dir, 'NoteStore');

    expect(await repository.get('a.b')).toBeUndefined();
    expect(await repository.get('../outside')).toBeUndefined();
    expect(await repository.delete('a.b')).toBe(false);
  });

  it('skips unreadable files when listing', async () => {
    const repository = new JsonFileRepository<Note>(dir, 'NoteStore');
    await repository.put(NOTE.id, NOTE);
    fs.writeFileSync(path.join(dir, 'broken.json'), '{"id": ');
    fs.writeFileSync(path.join(dir, 'readme.txt'), 'not a record');

    const notes = await repository.list();

    expect(notes).toEqual([NOTE]);
  });

  it('deletes records', async () => {
    const repository = new JsonFileRepository<Note>(dir, 'NoteStore');
    await repository.put(NOTE.id, NOTE);

    expect(await repository.delete(NOTE.id)).toBe(true);
    expect(await repository.get(NOTE.id)).toBeUndefined();
    expect(await repository.delete(NOTE.id)).toBe(false);
  });
});

describe('reviveDates', () => {
  it('revives ISO timestamps only', () => {
    const parsed = JSON.parse('{"at":"2030-01-01T09:00:00.000Z","name":"2030-01-01","n":3}', reviveDates);

    expect(parsed).toEqual({ at: new Date('2030-01-01T09:00:00.000Z'), name: '2030-01-01', n: 3 });
  });
});
