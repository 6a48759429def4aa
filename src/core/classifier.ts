import path from 'node:path';
import type {ProtectedRule, ProtectionConcern, SystemLayout} from './types.js';

const PATH_SEGMENT_NORMALIZER = /\/+/g;

// `null` for anything that is not a usable absolute POSIX path.
export const normalizeAbsolutePath = (value: unknown): string | null => {
	if (typeof value !== 'string') return null;

	let normalized = value.trim();
	if (!normalized || normalized.includes('\0')) return null;
	if (!normalized.startsWith('/')) return null;

	normalized = normalized.replace(PATH_SEGMENT_NORMALIZER, '/');
	normalized = path.posix.normalize(normalized);
	if (normalized.length > 1) {
		normalized = normalized.replace(/\/+$/, '');
	}

	return normalized || null;
};

/**
 * Literal string-prefix test: `/Users/me/Projects` also protects
 * `/Users/me/ProjectsBackup`. A path that cannot be normalized is excluded.
 */
export const isExcluded = (
	candidatePath: string,
	rules: Iterable<ProtectedRule>,
): boolean => {
	const normalizedPath = normalizeAbsolutePath(candidatePath);
	if (!normalizedPath) return true;

	return findMatchingRule(normalizedPath, rules) !== null;
};

export const findMatchingRule = (
	candidatePath: string,
	rules: Iterable<ProtectedRule>,
): ProtectedRule | null => {
	const normalizedPath = normalizeAbsolutePath(candidatePath);
	if (!normalizedPath) return null;

	for (const rule of rules) {
		const normalizedPrefix = normalizeAbsolutePath(rule.prefix);
		if (normalizedPrefix && normalizedPath.startsWith(normalizedPrefix)) {
			return rule;
		}
	}

	return null;
};

/** True when some rule prefix lies strictly below `candidatePath`. */
export const containsProtectedPath = (
	candidatePath: string,
	rules: Iterable<ProtectedRule>,
): boolean => {
	const normalizedPath = normalizeAbsolutePath(candidatePath);
	if (!normalizedPath) return false;
	const parentPrefix = normalizedPath === '/' ? '/' : `${normalizedPath}/`;

	for (const rule of rules) {
		const normalizedPrefix = normalizeAbsolutePath(rule.prefix);
		if (normalizedPrefix?.startsWith(parentPrefix)) return true;
	}

	return false;
};

type RuleTemplate = [base: 'home' | 'root', relativePath: string];

export const PROTECTION_CONCERNS: readonly ProtectionConcern[] = [
	'user-content',
	'other-runtime',
	'embedded-copy',
	'unrelated-cache',
];

const PROTECTED_RULE_TEMPLATES: Record<
	ProtectionConcern,
	readonly RuleTemplate[]
> = {
	'user-content': [
		['home', 'Projects'],
		['home', '.Trash'],
		['home', 'Downloads'],
		['home', 'IdeaProjects'],
		['home', 'WebstormProjects'],
		['home', 'Applications'],
		['root', 'Applications'],
	],
	'other-runtime': [
		['root', 'Library/Frameworks/Python.framework'],
		['root', 'usr/local/lib/python'],
		['root', 'opt/homebrew/lib/python'],
		['home', '.local/lib/python'],
		['home', 'Library/Python'],
		['home', '.virtualenvs'],
		['home', '.pyenv'],
	],
	'embedded-copy': [
		['home', '.vscode/extensions'],
		['home', '.vscode-server/extensions'],
		['home', '.cursor/extensions'],
	],
	'unrelated-cache': [
		['home', '.antigravity'],
		['home', '.cache/github-copilot'],
		['home', 'Library/Application Support/JetBrains'],
		['home', 'Library/Caches/JetBrains'],
		['home', 'Library/Caches/pypoetry'],
		['home', 'Library/Logs/JetBrains'],
		['home', 'Library/Caches/claude-cli-nodejs'],
		['root', 'private/tmp/claude'],
	],
};

export const PROTECTION_CONCERN_LABELS: Record<ProtectionConcern, string> = {
	'user-content': 'User content',
	'other-runtime': 'Other-language Playwright installs',
	'embedded-copy': 'Embedded copies (editor extensions)',
	'unrelated-cache': 'Unrelated tool caches',
};

export const buildProtectedRules = (
	layout: Pick<
		SystemLayout,
		'homeDirectory' | 'rootDirectory' | 'extraProtectedPaths'
	>,
): ProtectedRule[] => {
	const rules: ProtectedRule[] = [];
	const seen = new Set<string>();

	const addRule = (prefix: string, concern: ProtectionConcern): void => {
		const normalized = normalizeAbsolutePath(prefix);
		if (!normalized || seen.has(normalized)) return;
		seen.add(normalized);
		rules.push({prefix: normalized, concern});
	};

	for (const concern of PROTECTION_CONCERNS) {
		for (const [base, relativePath] of PROTECTED_RULE_TEMPLATES[concern]) {
			const baseDirectory =
				base === 'home' ? layout.homeDirectory : layout.rootDirectory;
			addRule(path.join(baseDirectory, relativePath), concern);
		}
	}

	for (const extraPath of layout.extraProtectedPaths) {
		addRule(extraPath, 'user-content');
	}

	return rules;
};
