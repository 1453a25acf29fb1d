import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { FilesystemError } from '../errors.js';
import { configureLogFile, dailyLogFile, getLogFile, isDebugEnabled, logError, setDebugEnabled } from './logger.js';

describe('dx logger', () => {
	const prev = process.env.IL2CPP_WORKBENCH_DEBUG;

	afterEach(() => {
		setDebugEnabled(false);
		configureLogFile(null);
		if (prev == null) delete process.env.IL2CPP_WORKBENCH_DEBUG;
		else process.env.IL2CPP_WORKBENCH_DEBUG = prev;
	});

	it('is disabled by default', () => {
		delete process.env.IL2CPP_WORKBENCH_DEBUG;
		expect(isDebugEnabled()).toBe(false);
	});

	it('enables via env var', () => {
		process.env.IL2CPP_WORKBENCH_DEBUG = '1';
		expect(isDebugEnabled()).toBe(true);
	});

	it('enables via setter (tests)', () => {
		delete process.env.IL2CPP_WORKBENCH_DEBUG;
		setDebugEnabled(true);
		expect(isDebugEnabled()).toBe(true);
	});

	it('names log files by local date', () => {
		expect(dailyLogFile(new Date(2026, 0, 5, 23, 59), '/logs')).toBe(join('/logs', '2026-01-05.log'));
	});

	it('writes errors with their stack to the log file even when debug is off', () => {
		delete process.env.IL2CPP_WORKBENCH_DEBUG;
		const file = join(mkdtempSync(join(tmpdir(), 'il2cpp-workbench-log-')), 'logs', 'today.log');
		configureLogFile(file);

		logError(new Error('boom'));
		const content = readFileSync(file, 'utf8');
		expect(content).toMatch(/^\S+ ERROR Error: boom\n/);
		expect(content).toContain('logger.test.ts');
	});

	it('leaves no log file configured when its directory cannot be created', () => {
		const base = mkdtempSync(join(tmpdir(), 'il2cpp-workbench-log-'));
		writeFileSync(join(base, 'logs'), 'not a directory');
		configureLogFile(join(base, 'ok.log'));

		expect(() => configureLogFile(join(base, 'logs', 'today.log'))).toThrow(FilesystemError);
		expect(getLogFile()).toBeNull();
	});
});
