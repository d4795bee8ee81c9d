/**
 * ============================================================================
 * HEADER DETECTOR SERVICE - La première ligne est-elle un en-tête ?
 * ============================================================================
 *
 * Aucun indice n'est fiable seul sur des tableaux réels (le formatage se perd
 * souvent à l'import, les mots-clés dépendent de la langue). Ce service
 * combine donc cinq signaux indépendants, chacun normalisé dans [0, 1] :
 *
 * | Signal                  | Poids |
 * |-------------------------|-------|
 * | Différence de formatage | 0.30  |
 * | Motif du contenu        | 0.25  |
 * | Cohérence des types     | 0.20  |
 * | Longueur des textes     | 0.15  |
 * | Unicité                 | 0.10  |
 *
 * confiance = Σ(score × poids) / Σ(poids), en-tête si confiance > 0.6
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Chaque signal est une entrée de HEADER_SIGNALS : ajouter ou retirer un
 *   signal ne touche pas au calcul de la combinaison
 * - Un signal sans données (pas de formatage) vaut 0, il ne plante pas
 */

import type { CellDataType, TableData, TableRow } from '../../shared/types/table.types';
import {
	contentLength,
	hasFormatting,
	markRowAsHeader,
	setHeaders,
} from '../../shared/utils/table-model.utils';
import { classifyCellData, type CellClassifierOptions } from './cell-classifier.service';

// ============================================================================
// CONSTANTES
// ============================================================================

/** Seuil de confiance au-delà duquel la ligne 0 est un en-tête */
export const HEADER_CONFIDENCE_THRESHOLD = 0.6;

const HEADER_KEYWORDS = [
	'name', 'id', 'title', 'date', 'time', 'type',
	'status', 'amount', 'count', 'number', 'code', 'description',
];

/** Lignes de données comparées pour le formatage et la longueur */
const FORMATTING_SAMPLE_ROWS = 3;

/** Lignes de données échantillonnées par colonne pour les types */
const TYPE_SAMPLE_ROWS = 5;

// ============================================================================
// SIGNAUX
// ============================================================================

/**
 * Signal de détection d'en-tête.
 * score() reçoit la ligne 0 et les lignes suivantes, et retourne une valeur dans [0, 1].
 */
export interface HeaderSignal {
	name: string;
	weight: number;
	score: (firstRow: TableRow, dataRows: TableRow[], options: HeaderDetectionOptions) => number;
}

export interface HeaderDetectionOptions {
	/** Seuil de confiance (0.6 par défaut) */
	threshold?: number;

	/** Signaux utilisés (HEADER_SIGNALS par défaut) */
	signals?: readonly HeaderSignal[];

	/** Options du classifieur pour le signal de cohérence des types */
	classifier?: CellClassifierOptions;
}

/**
 * Fraction des comparaisons (colonne par colonne, sur les 3 premières lignes
 * de données) où la présence de formatage ou le gras diffère.
 */
export function scoreFormattingDifference(firstRow: TableRow, dataRows: TableRow[]): number {
	if (dataRows.length === 0) return 0;

	let differences = 0;
	let comparisons = 0;

	firstRow.cells.forEach((firstCell, col) => {
		for (const dataRow of dataRows.slice(0, FORMATTING_SAMPLE_ROWS)) {
			const dataCell = dataRow.cells[col];
			if (!dataCell) continue;

			comparisons++;

			const presenceDiffers = hasFormatting(firstCell.formatting) !== hasFormatting(dataCell.formatting);
			const boldDiffers =
				firstCell.formatting !== undefined &&
				dataCell.formatting !== undefined &&
				firstCell.formatting.bold &&
				!dataCell.formatting.bold;

			if (presenceDiffers || boldDiffers) {
				differences++;
			}
		}
	});

	return comparisons > 0 ? differences / comparisons : 0;
}

/**
 * Indices typiques d'un en-tête dans les cellules de la ligne 0 :
 * mot-clé, texte court sans longue suite de chiffres, mot capitalisé.
 * Chaque indice compte, le total est ramené à 1 au maximum.
 */
export function scoreContentPattern(firstRow: TableRow): number {
	const totalCells = firstRow.cells.length;
	if (totalCells === 0) return 0;

	let indicators = 0;

	for (const cell of firstRow.cells) {
		const text = cell.content.trim();
		const lower = text.toLowerCase();
		const length = Array.from(lower).length;

		if (HEADER_KEYWORDS.some((keyword) => lower.includes(keyword))) {
			indicators++;
		}

		// Court et descriptif (3 chiffres au plus). Un nombre court comme
		// "12.5" compte aussi : une grille de petits nombres peut passer le seuil
		const digitCount = (lower.match(/\p{N}/gu) ?? []).length;
		if (length > 2 && length < 30 && digitCount <= 3) {
			indicators++;
		}

		if (text.split(/\s+/).some((word) => /^\p{Lu}/u.test(word))) {
			indicators++;
		}
	}

	return Math.min(indicators / totalCells, 1);
}

/**
 * Cohérence des types par colonne : part des cellules qui partagent le type
 * majoritaire (5 premières lignes de données), moyennée sur les colonnes.
 */
export function scoreDataTypeConsistency(
	dataRows: TableRow[],
	options: CellClassifierOptions = {}
): number {
	if (dataRows.length === 0) return 0;

	const sample = dataRows.slice(0, TYPE_SAMPLE_ROWS);
	const maxColumns = dataRows.reduce((max, row) => Math.max(max, row.cells.length), 0);

	let total = 0;
	let columns = 0;

	for (let col = 0; col < maxColumns; col++) {
		const counts = new Map<CellDataType, number>();
		let cellCount = 0;

		for (const row of sample) {
			const cell = row.cells[col];
			if (!cell) continue;

			const type = classifyCellData(cell.content, options);
			counts.set(type, (counts.get(type) ?? 0) + 1);
			cellCount++;
		}

		if (cellCount > 0) {
			const majority = Math.max(...counts.values());
			total += majority / cellCount;
			columns++;
		}
	}

	return columns > 0 ? total / columns : 0;
}

/**
 * Les en-têtes sont en général plus courts que les données.
 * - 0.8 : moyenne ligne 0 dans ]0, 50[ et données au moins 20% plus longues
 * - 0.4 : moyenne ligne 0 dans ]0, 30[
 * - 0 sinon
 */
export function scoreLengthPattern(firstRow: TableRow, dataRows: TableRow[]): number {
	if (dataRows.length === 0) return 0;

	const firstAverage = averageLength(firstRow);

	const sampled = dataRows.slice(0, FORMATTING_SAMPLE_ROWS).filter((row) => row.cells.length > 0);
	if (sampled.length > 0) {
		const dataAverage = sampled.reduce((sum, row) => sum + averageLength(row), 0) / sampled.length;

		if (firstAverage > 0 && firstAverage < 50 && dataAverage > firstAverage * 1.2) {
			return 0.8;
		}
	}

	return firstAverage > 0 && firstAverage < 30 ? 0.4 : 0;
}

/**
 * Part des cellules non vides de la ligne 0 (en minuscules) qui sont distinctes.
 */
export function scoreUniqueness(firstRow: TableRow): number {
	const contents = firstRow.cells
		.map((cell) => cell.content.trim().toLowerCase())
		.filter((content) => content !== '');

	if (contents.length === 0) return 0;

	return new Set(contents).size / contents.length;
}

function averageLength(row: TableRow): number {
	if (row.cells.length === 0) return 0;

	const total = row.cells.reduce((sum, cell) => sum + contentLength(cell), 0);
	return total / row.cells.length;
}

/**
 * Signaux par défaut, dans l'ordre de leur poids.
 */
export const HEADER_SIGNALS: readonly HeaderSignal[] = [
	{
		name: 'formattingDifference',
		weight: 0.3,
		score: (firstRow, dataRows) => scoreFormattingDifference(firstRow, dataRows),
	},
	{
		name: 'contentPattern',
		weight: 0.25,
		score: (firstRow) => scoreContentPattern(firstRow),
	},
	{
		name: 'dataTypeConsistency',
		weight: 0.2,
		score: (_firstRow, dataRows, options) => scoreDataTypeConsistency(dataRows, options.classifier),
	},
	{
		name: 'lengthPattern',
		weight: 0.15,
		score: (firstRow, dataRows) => scoreLengthPattern(firstRow, dataRows),
	},
	{
		name: 'uniqueness',
		weight: 0.1,
		score: (firstRow) => scoreUniqueness(firstRow),
	},
];

// ============================================================================
// COMBINAISON
// ============================================================================

export interface HeaderConfidence {
	confidence: number;
	scores: Record<string, number>;
}

/**
 * Calcule la confiance "la ligne 0 est un en-tête" et le détail par signal.
 *
 * @example
 * const { confidence, scores } = computeHeaderConfidence(table);
 * // confidence ≈ 0.61, scores.uniqueness = 1
 */
export function computeHeaderConfidence(
	table: TableData,
	options: HeaderDetectionOptions = {}
): HeaderConfidence {
	const signals = options.signals ?? HEADER_SIGNALS;
	const scores: Record<string, number> = {};

	if (table.rows.length === 0) {
		return { confidence: 0, scores };
	}

	const [firstRow, ...dataRows] = table.rows;
	let weighted = 0;
	let totalWeight = 0;

	for (const signal of signals) {
		const score = clamp01(signal.score(firstRow, dataRows, options));
		scores[signal.name] = score;
		weighted += score * signal.weight;
		totalWeight += signal.weight;
	}

	return {
		confidence: totalWeight > 0 ? weighted / totalWeight : 0,
		scores,
	};
}

/**
 * Détecte l'en-tête du tableau et annote la ligne 0 si la confiance dépasse le seuil.
 *
 * Sans effet sur un tableau vide ou déjà analysé : la décision prise au
 * premier passage n'est jamais revue, même si le filtrage ou l'expansion
 * des fusions ont modifié les lignes depuis.
 *
 * @returns true si un en-tête est (ou était déjà) détecté
 */
export function detectHeader(table: TableData, options: HeaderDetectionOptions = {}): boolean {
	if (table.rows.length === 0) return false;
	if (table.hasHeader || table.headerDetected) return table.hasHeader;

	table.headerDetected = true;

	const threshold = options.threshold ?? HEADER_CONFIDENCE_THRESHOLD;
	const { confidence } = computeHeaderConfidence(table, options);

	if (confidence <= threshold) {
		return false;
	}

	const firstRow = table.rows[0];
	setHeaders(
		table,
		firstRow.cells.map((cell) => cell.content.trim())
	);
	markRowAsHeader(firstRow);

	return true;
}

function clamp01(value: number): number {
	if (!Number.isFinite(value)) return 0;
	return Math.min(Math.max(value, 0), 1);
}
