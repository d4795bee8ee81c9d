/**
 * ============================================================================
 * CONFIGURATION - Préréglages et validation de TableExtractionConfig
 * ============================================================================
 *
 * La configuration est une valeur immuable transmise explicitement à chaque
 * étape du pipeline. Les paramètres du nœud n8n correspondent un à un à
 * ses champs.
 *
 * @example
 * const config = withConfig(createDefaultConfig(), { mergeCellsHandling: 'expand' });
 */

import type {
	MergeCellsHandling,
	TableExtractionConfig,
	TableExtractionMode,
	TableOutputFormat,
} from '../types/table.types';

// ============================================================================
// VALEURS AUTORISÉES
// ============================================================================

export const EXTRACTION_MODES: readonly TableExtractionMode[] = ['simple', 'structured', 'formatted', 'full'];

export const MERGE_CELLS_HANDLINGS: readonly MergeCellsHandling[] = ['ignore', 'preserve', 'expand'];

export const OUTPUT_FORMATS: readonly TableOutputFormat[] = ['plainText', 'csv', 'tsv', 'markdown', 'json', 'html'];

// ============================================================================
// PRÉRÉGLAGES
// ============================================================================

/**
 * Configuration par défaut : extraction structurée, détection d'en-tête,
 * fusions marquées, cellules vides retirées.
 */
export function createDefaultConfig(): TableExtractionConfig {
	return Object.freeze({
		mode: 'structured',
		detectHeaders: true,
		preserveFormatting: false,
		includeEmptyCells: false,
		mergeCellsHandling: 'preserve',
		outputFormat: 'plainText',
	});
}

/**
 * Configuration minimale pour une simple extraction de texte.
 */
export function createSimpleConfig(): TableExtractionConfig {
	return Object.freeze({
		mode: 'simple',
		detectHeaders: false,
		preserveFormatting: false,
		includeEmptyCells: false,
		mergeCellsHandling: 'ignore',
		outputFormat: 'plainText',
	});
}

/**
 * Configuration complète : toutes les analyses, formatage et cellules vides conservés.
 */
export function createFullConfig(): TableExtractionConfig {
	return Object.freeze({
		mode: 'full',
		detectHeaders: true,
		preserveFormatting: true,
		includeEmptyCells: true,
		mergeCellsHandling: 'preserve',
		outputFormat: 'json',
	});
}

/**
 * Retourne une nouvelle configuration avec les champs remplacés.
 * La configuration de base n'est pas modifiée.
 */
export function withConfig(
	base: TableExtractionConfig,
	overrides: Partial<TableExtractionConfig>
): TableExtractionConfig {
	return Object.freeze({ ...base, ...overrides });
}

// ============================================================================
// VALIDATION
// ============================================================================

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
	return typeof value === 'string' && values.some((candidate) => candidate === value);
}

/**
 * Valide des surcharges de configuration non typées (paramètres de nœud, JSON).
 *
 * @example
 * validateTableExtractionConfig({ mergeCellsHandling: 'merge' });
 * // { isValid: false, errors: ['mergeCellsHandling doit être "ignore", "preserve" ou "expand"'] }
 */
export function validateTableExtractionConfig(
	value: Record<string, unknown>
): { isValid: boolean; errors: string[] } {
	const errors: string[] = [];

	if (value.mode !== undefined && !isOneOf(EXTRACTION_MODES, value.mode)) {
		errors.push('mode doit être "simple", "structured", "formatted" ou "full"');
	}

	if (value.mergeCellsHandling !== undefined && !isOneOf(MERGE_CELLS_HANDLINGS, value.mergeCellsHandling)) {
		errors.push('mergeCellsHandling doit être "ignore", "preserve" ou "expand"');
	}

	if (value.outputFormat !== undefined && !isOneOf(OUTPUT_FORMATS, value.outputFormat)) {
		errors.push(`outputFormat doit être l'un de: ${OUTPUT_FORMATS.join(', ')}`);
	}

	for (const key of ['detectHeaders', 'preserveFormatting', 'includeEmptyCells']) {
		if (value[key] !== undefined && typeof value[key] !== 'boolean') {
			errors.push(`${key} doit être un booléen`);
		}
	}

	return {
		isValid: errors.length === 0,
		errors,
	};
}

/**
 * Convertit des surcharges non typées en surcharges typées.
 * Les valeurs invalides sont ignorées (valider d'abord pour les signaler).
 */
export function parseConfigOverrides(value: Record<string, unknown>): Partial<TableExtractionConfig> {
	const overrides: {
		-readonly [K in keyof TableExtractionConfig]?: TableExtractionConfig[K];
	} = {};

	if (isOneOf(EXTRACTION_MODES, value.mode)) {
		overrides.mode = value.mode;
	}
	if (isOneOf(MERGE_CELLS_HANDLINGS, value.mergeCellsHandling)) {
		overrides.mergeCellsHandling = value.mergeCellsHandling;
	}
	if (isOneOf(OUTPUT_FORMATS, value.outputFormat)) {
		overrides.outputFormat = value.outputFormat;
	}
	if (typeof value.detectHeaders === 'boolean') {
		overrides.detectHeaders = value.detectHeaders;
	}
	if (typeof value.preserveFormatting === 'boolean') {
		overrides.preserveFormatting = value.preserveFormatting;
	}
	if (typeof value.includeEmptyCells === 'boolean') {
		overrides.includeEmptyCells = value.includeEmptyCells;
	}

	return overrides;
}
