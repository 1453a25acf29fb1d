import { afterEach, describe, expect, it } from 'vitest';
import { chmodSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { delimiter, join } from 'node:path';

import { which } from './which.js';

describe('which', () => {
	const prevPath = process.env.PATH;
	const prevExt = process.env.PATHEXT;

	afterEach(() => {
		process.env.PATH = prevPath;
		if (prevExt == null) delete process.env.PATHEXT;
		else process.env.PATHEXT = prevExt;
	});

	function binDir() {
		return mkdtempSync(join(tmpdir(), 'il2cpp-workbench-bin-'));
	}

	it('finds an executable on PATH', () => {
		const dir = binDir();
		const tool = join(dir, 'python3');
		writeFileSync(tool, '#!/bin/sh\n');
		chmodSync(tool, 0o755);
		process.env.PATH = ['/nonexistent', dir].join(delimiter);

		expect(which('python3', 'linux')).toBe(tool);
	});

	it('ignores files without the execute bit', () => {
		const dir = binDir();
		const tool = join(dir, 'python3');
		writeFileSync(tool, '');
		chmodSync(tool, 0o644);
		process.env.PATH = dir;

		expect(which('python3', 'linux')).toBe(null);
	});

	it('tries PATHEXT suffixes on Windows', () => {
		const dir = binDir();
		writeFileSync(join(dir, 'dotnet.exe'), '');
		process.env.PATH = dir;
		process.env.PATHEXT = '.EXE;.CMD';

		expect(which('dotnet', 'win32')).toBe(join(dir, 'dotnet.exe'));
	});
});
