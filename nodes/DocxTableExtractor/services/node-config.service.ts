/**
 * ============================================================================
 * NODE CONFIG SERVICE - Paramètres du nœud vers TableExtractionConfig
 * ============================================================================
 *
 * Le nœud propose un préréglage (default, simple, full) puis une collection
 * de surcharges. Chaque champ de la collection correspond à un champ de la
 * configuration.
 */

import type { TableExtractionConfig } from '../../shared/types/table.types';
import {
	createDefaultConfig,
	createFullConfig,
	createSimpleConfig,
	parseConfigOverrides,
	validateTableExtractionConfig,
	withConfig,
} from '../../shared/utils/table-config.utils';

export type ConfigPreset = 'default' | 'simple' | 'full' | 'custom';

export const CONFIG_PRESETS: readonly ConfigPreset[] = ['default', 'simple', 'full', 'custom'];

/**
 * Retourne la configuration d'un préréglage. "custom" part de la
 * configuration par défaut.
 */
export function getPresetConfig(preset: ConfigPreset): TableExtractionConfig {
	switch (preset) {
		case 'simple':
			return createSimpleConfig();
		case 'full':
			return createFullConfig();
		case 'default':
		case 'custom':
			return createDefaultConfig();
	}
}

/**
 * Construit la configuration à partir des paramètres du nœud.
 *
 * @param preset - Préréglage choisi (valeur brute du paramètre)
 * @param overrides - Collection "config" du nœud
 * @throws Error si le préréglage ou une surcharge est invalide
 *
 * @example
 * buildConfigFromNodeParameters('simple', { outputFormat: 'csv' });
 * // { mode: 'simple', detectHeaders: false, ..., outputFormat: 'csv' }
 */
export function buildConfigFromNodeParameters(
	preset: string,
	overrides: Record<string, unknown> = {}
): TableExtractionConfig {
	const presetName = CONFIG_PRESETS.find((candidate) => candidate === preset);
	if (!presetName) {
		throw new Error(`Préréglage inconnu "${preset}". Valeurs possibles : ${CONFIG_PRESETS.join(', ')}`);
	}

	const validation = validateTableExtractionConfig(overrides);
	if (!validation.isValid) {
		throw new Error(`Configuration invalide : ${validation.errors.join(' ; ')}`);
	}

	return withConfig(getPresetConfig(presetName), parseConfigOverrides(overrides));
}
