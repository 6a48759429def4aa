import fs from 'node:fs/promises';
import type {Dirent, Stats} from 'node:fs';
import path from 'node:path';
import {isExcluded} from './classifier.js';
import type {ProtectedRule} from './types.js';

export const DEFAULT_SEARCH_DEPTH = 8;
export const DEFAULT_RESULT_CAP = 20;

export type EntryKind = 'any' | 'directory' | 'file';
export type MatchMode = 'substring' | 'exact';

export interface PatternSearchOptions {
	/** Lowercased substrings by default; `exact` compares names as given. */
	patterns: readonly string[];
	matchMode?: MatchMode;
	/** Directory levels below the root that are read; `1` lists the root only. */
	maxDepth?: number;
	maxResults?: number;
	entryKind?: EntryKind;
	prunePaths?: readonly string[];
	protectedRules?: readonly ProtectedRule[];
	descendIntoMatches?: boolean;
}

export interface PatternSearchResult {
	root: string;
	matches: string[];
	truncated: boolean;
}

// Apparent size; unreadable entries count as 0.
export const sizeOf = async (targetPath: string): Promise<number> => {
	let stat: Stats;
	try {
		stat = await fs.lstat(targetPath);
	} catch {
		return 0;
	}

	if (!stat.isDirectory()) return stat.size;

	let entries: Dirent[];
	try {
		entries = await fs.readdir(targetPath, {withFileTypes: true});
	} catch {
		return 0;
	}

	let size = 0;
	for (const entry of entries) {
		// eslint-disable-next-line no-await-in-loop
		size += await sizeOf(path.join(targetPath, entry.name));
	}

	return size;
};

export const pathExists = async (targetPath: string): Promise<boolean> => {
	try {
		await fs.lstat(targetPath);
		return true;
	} catch {
		return false;
	}
};

export const directoryExists = async (directory: string): Promise<boolean> => {
	try {
		const stat = await fs.stat(directory);
		return stat.isDirectory();
	} catch {
		return false;
	}
};

const isUnderPrefix = (targetPath: string, prefixes: readonly string[]) =>
	prefixes.some(
		prefix =>
			targetPath === prefix ||
			targetPath.startsWith(prefix.endsWith('/') ? prefix : `${prefix}/`),
	);

const matchesPatterns = (
	name: string,
	patterns: readonly string[],
	matchMode: MatchMode,
): boolean => {
	if (matchMode === 'exact') return patterns.includes(name);
	const normalizedName = name.toLowerCase();
	return patterns.some(pattern => normalizedName.includes(pattern));
};

const matchesKind = (entry: Dirent, entryKind: EntryKind): boolean => {
	if (entryKind === 'directory') return entry.isDirectory();
	if (entryKind === 'file') return entry.isFile();
	return true;
};

// Breadth-first; symlinks are reported but never followed.
export const searchByName = async (
	root: string,
	options: PatternSearchOptions,
): Promise<PatternSearchResult> => {
	const maxDepth = options.maxDepth ?? DEFAULT_SEARCH_DEPTH;
	const maxResults = options.maxResults ?? DEFAULT_RESULT_CAP;
	const entryKind = options.entryKind ?? 'any';
	const prunePaths = options.prunePaths ?? [];
	const protectedRules = options.protectedRules ?? [];
	const matchMode = options.matchMode ?? 'substring';
	const patterns =
		matchMode === 'exact'
			? [...options.patterns]
			: options.patterns.map(pattern => pattern.toLowerCase());
	const rootDirectory = path.resolve(root);
	const matches: string[] = [];

	const queue: Array<{directory: string; depth: number}> = [
		{directory: rootDirectory, depth: 1},
	];

	for (let head = 0; head < queue.length; head++) {
		const next = queue[head];
		if (!next) break;

		let entries: Dirent[];
		try {
			// eslint-disable-next-line no-await-in-loop
			entries = await fs.readdir(next.directory, {withFileTypes: true});
		} catch {
			continue;
		}

		entries.sort((left, right) => left.name.localeCompare(right.name));
		for (const entry of entries) {
			const entryPath = path.join(next.directory, entry.name);
			if (isUnderPrefix(entryPath, prunePaths)) continue;
			if (protectedRules.length > 0 && isExcluded(entryPath, protectedRules)) {
				continue;
			}

			const isDirectory = entry.isDirectory();
			const matched =
				matchesKind(entry, entryKind) &&
				matchesPatterns(entry.name, patterns, matchMode);
			if (matched) {
				matches.push(entryPath);
				if (matches.length >= maxResults) {
					return {root: rootDirectory, matches, truncated: true};
				}
			}

			if (!isDirectory) continue;
			if (matched && !options.descendIntoMatches) continue;
			if (next.depth >= maxDepth) continue;
			queue.push({directory: entryPath, depth: next.depth + 1});
		}
	}

	return {root: rootDirectory, matches, truncated: false};
};
