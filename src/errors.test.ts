import { describe, expect, it } from 'vitest';

import {
	FileAccessError,
	FilesystemError,
	InputNotFoundError,
	ToolExitError,
	ToolNotFoundError,
	exitCodeFor,
} from './errors.js';

function systemError(code: string, errno: number) {
	return Object.assign(new Error(`${code}: failed`), { code, errno });
}

describe('errors', () => {
	it('carries the failing path and system code', () => {
		const err = new FileAccessError('/games/GameAssembly.dll', systemError('EACCES', -13));
		expect(err.message).toBe('Cannot read /games/GameAssembly.dll (EACCES)');
		expect(err.code).toBe('FILE_ACCESS');
		expect(err.name).toBe('FileAccessError');
		expect(err.details).toEqual({ path: '/games/GameAssembly.dll' });
	});

	it('formats tool failures', () => {
		expect(new ToolNotFoundError('JDK', '/apps/jdk-*/bin/java', 'Extract a JDK').message).toBe(
			'Could not find JDK at /apps/jdk-*/bin/java. Extract a JDK',
		);
		expect(new ToolExitError(['ghidra', '--headless'], 2).message).toBe('Command exited with code 2: ghidra --headless');
	});
});

describe('exitCodeFor', () => {
	it('uses the exit code of a failed tool', () => {
		expect(exitCodeFor(new ToolExitError(['x'], 5))).toBe(5);
	});

	it('uses the errno of filesystem failures', () => {
		expect(exitCodeFor(new FileAccessError('/a', systemError('ENOENT', -2)))).toBe(2);
		expect(exitCodeFor(new FilesystemError('/b', systemError('EACCES', -13)))).toBe(13);
		expect(exitCodeFor(systemError('ENOSPC', -28))).toBe(28);
	});

	it('falls back to 1', () => {
		expect(exitCodeFor(new InputNotFoundError('/a'))).toBe(1);
		expect(exitCodeFor(new FileAccessError('/a'))).toBe(1);
		expect(exitCodeFor('boom')).toBe(1);
	});
});
