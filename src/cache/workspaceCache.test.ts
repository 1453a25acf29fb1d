import { describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { FileAccessError, FilesystemError } from '../errors.js';
import { WorkspaceCache } from './workspaceCache.js';

const ABC123_ID = 'e0bebd22';
const ABC124_ID = 'cf54666d';

function setup() {
	const base = mkdtempSync(join(tmpdir(), 'il2cpp-workbench-ws-'));
	const root = join(base, 'workspaces');
	const write = (name: string, content: string) => {
		const p = join(base, name);
		writeFileSync(p, content);
		return p;
	};
	return { base, root, cache: new WorkspaceCache({ root }), write };
}

describe('WorkspaceCache.resolve', () => {
	it('maps content to <root>/<first 8 hex of sha256> and creates it', async () => {
		const { root, cache, write } = setup();
		const entry = await cache.resolve(write('GameAssembly.dll', 'ABC123'));

		expect(entry.identifier).toBe(ABC123_ID);
		expect(entry.directory).toBe(join(root, ABC123_ID));
		expect(existsSync(entry.directory)).toBe(true);
	});

	it('gives identical bytes the same workspace regardless of file name', async () => {
		const { cache, write } = setup();
		const a = await cache.resolve(write('a.dll', 'ABC123'));
		const b = await cache.resolve(write('b.dll', 'ABC123'));

		expect(b.identifier).toBe(a.identifier);
		expect(b.directory).toBe(a.directory);
	});

	it('gives differing content different identifiers', async () => {
		const { cache, write } = setup();
		const a = await cache.resolve(write('a.dll', 'ABC123'));
		const b = await cache.resolve(write('b.dll', 'ABC124'));

		expect(a.identifier).toBe(ABC123_ID);
		expect(b.identifier).toBe(ABC124_ID);
	});

	it('is idempotent and keeps what earlier runs wrote', async () => {
		const { cache, write } = setup();
		const p = write('GameAssembly.dll', 'ABC123');
		const first = await cache.resolve(p);
		writeFileSync(join(first.directory, 'script.json'), '{"ok":true}');

		const second = await cache.resolve(p);
		expect(second.directory).toBe(first.directory);
		expect(readFileSync(join(second.directory, 'script.json'), 'utf8')).toBe('{"ok":true}');
	});

	it('keeps the identifier when the artifact is moved', async () => {
		const { base, cache, write } = setup();
		const p = write('GameAssembly.dll', 'ABC123');
		const before = await cache.resolve(p);

		mkdirSync(join(base, 'moved'));
		const moved = join(base, 'moved', 'renamed.dll');
		renameSync(p, moved);
		const after = await cache.resolve(moved);

		expect(after.identifier).toBe(before.identifier);
		expect(after.artifactPath).toBe(moved);
	});

	it('tolerates concurrent resolves of the same artifact', async () => {
		const { cache, write } = setup();
		const p = write('GameAssembly.dll', 'ABC123');
		const entries = await Promise.all([1, 2, 3, 4, 5].map(() => cache.resolve(p)));

		expect(new Set(entries.map((e) => e.directory)).size).toBe(1);
	});

	it('raises FileAccessError for a missing artifact and creates nothing', async () => {
		const { base, root, cache } = setup();
		await expect(cache.resolve(join(base, 'nope.dll'))).rejects.toBeInstanceOf(FileAccessError);
		expect(existsSync(root)).toBe(false);
	});

	it('raises FilesystemError when the root cannot hold directories', async () => {
		const { base, write } = setup();
		const fileRoot = write('not-a-dir', 'x');
		const cache = new WorkspaceCache({ root: fileRoot });

		const err = await cache.resolve(write('GameAssembly.dll', 'ABC123')).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(FilesystemError);
		expect(err).toMatchObject({ path: join(base, 'not-a-dir', ABC123_ID) });
	});
});

describe('WorkspaceCache.identify', () => {
	it('hashes without creating the workspace', async () => {
		const { root, cache, write } = setup();
		expect(await cache.identify(write('GameAssembly.dll', 'ABC123'))).toBe(ABC123_ID);
		expect(existsSync(root)).toBe(false);
	});
});

describe('WorkspaceEntry', () => {
	it('checks for expected outputs by name', async () => {
		const { cache, write } = setup();
		const entry = await cache.resolve(write('GameAssembly.dll', 'ABC123'));

		expect(entry.pathOf('MyGame/GameAssembly.dll')).toBe(join(entry.directory, 'MyGame', 'GameAssembly.dll'));
		expect(entry.has('il2cpp.h')).toBe(false);
		writeFileSync(entry.pathOf('il2cpp.h'), '// header');
		expect(entry.has('il2cpp.h')).toBe(true);
	});
});

describe('WorkspaceCache.list', () => {
	it('is empty when the root does not exist', () => {
		const { cache } = setup();
		expect(cache.list()).toEqual([]);
	});

	it('summarises identifier directories only', async () => {
		const { root, cache, write } = setup();
		const a = await cache.resolve(write('a.dll', 'ABC123'));
		await cache.resolve(write('b.dll', 'ABC124'));
		writeFileSync(join(a.directory, 'script.json'), 'abc');
		mkdirSync(join(root, 'notes'));

		const list = cache.list();
		expect(list.map((e) => e.identifier)).toEqual([ABC124_ID, ABC123_ID]);
		expect(list[1]).toMatchObject({ directory: a.directory, files: 1, bytes: 3 });
		expect(list[0]).toMatchObject({ files: 0, bytes: 0, newestMtimeMs: 0 });
	});
});
