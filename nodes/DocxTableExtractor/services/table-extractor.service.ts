/**
 * ============================================================================
 * TABLE EXTRACTOR SERVICE - Pipeline d'inférence de structure
 * ============================================================================
 *
 * Ce service transforme une grille brute de textes de cellules en un
 * TableData annoté : en-tête détecté, fusions marquées, cellules vides
 * filtrées.
 *
 * PIPELINE (ordre strict) :
 * 1. Construction des lignes (cellule vide → 'empty', sinon 'data')
 * 2. updateStatistics
 * 3. Détection d'en-tête (si config.detectHeaders)
 * 4. Fusions (selon config.mergeCellsHandling)
 * 5. Filtrage des cellules vides (si !config.includeEmptyCells)
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - La configuration est passée explicitement à chaque étape, le service
 *   ne garde aucun état entre deux appels
 * - Une grille irrégulière n'est jamais une erreur : on produit toujours
 *   un tableau au mieux
 * - Seule une donnée impossible à parcourir lève une TableExtractionError
 *   (voir parseRawTableGrid)
 */

import type {
	CellAlignment,
	CellFormatting,
	RawTableCell,
	RawTableGrid,
	TableCell,
	TableData,
	TableExtractionConfig,
	TableMetadata,
} from '../../shared/types/table.types';
import { TableExtractionError } from '../../shared/errors';
import { createDefaultConfig } from '../../shared/utils/table-config.utils';
import {
	addCell,
	addRow,
	applyFormattingToText,
	createFormatting,
	createTableCell,
	createTableData,
	createTableRow,
	hasFormatting,
	isCellEmpty,
	updateStatistics,
} from '../../shared/utils/table-model.utils';
import { detectHeader } from './header-detector.service';
import { handleMergedCells } from './merge-handler.service';

// ============================================================================
// FONCTION PRINCIPALE
// ============================================================================

/**
 * Extrait un tableau annoté depuis une grille brute.
 *
 * @param grid - Lignes de cellules (texte ou { text, formatting, alignment })
 * @param config - Configuration (createDefaultConfig() par défaut)
 * @param meta - tableId / title recopiés tels quels
 *
 * @example
 * const table = extractTable([
 *   ['Name', 'Age', 'Department'],
 *   ['John', '25', 'Eng'],
 *   ['Jane', '30', 'Mkt'],
 * ]);
 * // table.hasHeader === true, table.headers = ['Name', 'Age', 'Department']
 */
export function extractTable(
	grid: RawTableGrid,
	config: TableExtractionConfig = createDefaultConfig(),
	meta: TableMetadata = {}
): TableData {
	const table = buildTableData(grid, config, meta);
	return processTable(table, config);
}

/**
 * Construit le tableau sans aucune inférence (étape 1).
 */
export function buildTableData(
	grid: RawTableGrid,
	config: TableExtractionConfig,
	meta: TableMetadata = {}
): TableData {
	const table = createTableData(meta);

	grid.forEach((rawRow, rowIndex) => {
		const row = createTableRow(rowIndex);

		for (const rawCell of rawRow) {
			addCell(row, buildCell(rawCell, config.preserveFormatting));
		}

		addRow(table, row);
	});

	return table;
}

/**
 * Applique les étapes 2 à 5 à un tableau déjà construit.
 *
 * Relancer le pipeline sur un tableau déjà traité ne change ni les en-têtes
 * ni les cellules déjà fusionnées.
 */
export function processTable(table: TableData, config: TableExtractionConfig): TableData {
	updateStatistics(table);

	if (config.detectHeaders) {
		detectHeader(table);
	}

	handleMergedCells(table, config.mergeCellsHandling);

	if (!config.includeEmptyCells) {
		filterEmptyCells(table);
	}

	return table;
}

/**
 * Retire les cellules vides de chaque ligne et recalcule les compteurs.
 * Idempotent.
 */
export function filterEmptyCells(table: TableData): void {
	for (const row of table.rows) {
		row.cells = row.cells.filter((cell) => !isCellEmpty(cell));
	}

	updateStatistics(table);
}

// ============================================================================
// CONSTRUCTION DES CELLULES
// ============================================================================

function buildCell(rawCell: string | RawTableCell, preserveFormatting: boolean): TableCell {
	if (typeof rawCell === 'string') {
		return createTableCell(rawCell);
	}

	if (!preserveFormatting) {
		return createTableCell(rawCell.text);
	}

	const formatting = rawCell.formatting ? createFormatting(rawCell.formatting) : undefined;
	const cell = createTableCell(rawCell.text, hasFormatting(formatting) ? formatting : undefined);

	if (cell.formatting && !isCellEmpty(cell)) {
		cell.formattedContent = applyFormattingToText(cell.formatting, cell.content);
	}
	if (rawCell.alignment) {
		cell.alignment = rawCell.alignment;
	}

	return cell;
}

// ============================================================================
// VALIDATION DES DONNÉES NON TYPÉES
// ============================================================================

const ALIGNMENTS: readonly CellAlignment[] = ['left', 'center', 'right', 'justify'];

/**
 * Valide une grille reçue sous forme non typée (JSON d'un item n8n, par exemple).
 *
 * Accepte pour chaque cellule : une chaîne, un nombre, un booléen, null,
 * ou un objet { text, formatting?, alignment? }.
 *
 * @throws TableExtractionError si la grille ne peut pas être parcourue
 *
 * @example
 * parseRawTableGrid([['A', 1], [null, { text: 'B' }]]);
 * // [['A', '1'], ['', { text: 'B' }]]
 */
export function parseRawTableGrid(value: unknown): RawTableGrid {
	if (!Array.isArray(value)) {
		throw new TableExtractionError(
			'La grille du tableau doit être un tableau de lignes. ' +
				`Type reçu : ${describeType(value)}.`
		);
	}

	return value.map((rawRow: unknown, rowIndex) => {
		if (!Array.isArray(rawRow)) {
			throw new TableExtractionError(
				`La ligne ${rowIndex} n'est pas un tableau de cellules (type reçu : ${describeType(rawRow)}).`,
				{ row: rowIndex }
			);
		}

		return rawRow.map((rawCell: unknown, col) => parseRawCell(rawCell, rowIndex, col));
	});
}

function parseRawCell(rawCell: unknown, row: number, col: number): string | RawTableCell {
	if (rawCell === null || rawCell === undefined) {
		return '';
	}
	if (typeof rawCell === 'string') {
		return rawCell;
	}
	if (typeof rawCell === 'number' || typeof rawCell === 'boolean') {
		return String(rawCell);
	}

	if (isRecord(rawCell) && typeof rawCell.text === 'string') {
		const cell: RawTableCell = { text: rawCell.text };

		if (isRecord(rawCell.formatting)) {
			cell.formatting = parseRawFormatting(rawCell.formatting);
		}

		const alignment = rawCell.alignment;
		if (typeof alignment === 'string') {
			const known = ALIGNMENTS.find((candidate) => candidate === alignment);
			if (known) {
				cell.alignment = known;
			}
		}

		return cell;
	}

	throw new TableExtractionError(
		`Cellule illisible en ligne ${row}, colonne ${col} : ` +
			`attendu une chaîne ou un objet { text }, reçu ${describeType(rawCell)}.`,
		{ row, col }
	);
}

function parseRawFormatting(value: Record<string, unknown>): Partial<CellFormatting> {
	const formatting: Partial<CellFormatting> = {};

	if (typeof value.bold === 'boolean') formatting.bold = value.bold;
	if (typeof value.italic === 'boolean') formatting.italic = value.italic;
	if (typeof value.underline === 'boolean') formatting.underline = value.underline;
	if (typeof value.backgroundColor === 'string') formatting.backgroundColor = value.backgroundColor;
	if (typeof value.textColor === 'string') formatting.textColor = value.textColor;
	if (typeof value.fontSize === 'number') formatting.fontSize = value.fontSize;
	if (typeof value.fontFamily === 'string') formatting.fontFamily = value.fontFamily;

	return formatting;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
	if (value === null) return 'null';
	if (Array.isArray(value)) return 'array';
	return typeof value;
}

// ============================================================================
// FONCTIONS UTILITAIRES
// ============================================================================

/**
 * Compte le nombre total de cellules dans tous les tableaux.
 */
export function countTotalCells(tables: TableData[]): number {
	let total = 0;

	for (const table of tables) {
		for (const row of table.rows) {
			total += row.cells.length;
		}
	}

	return total;
}

/**
 * Vérifie si un tableau contient une cellule fusionnée.
 */
export function hasMergedCells(table: TableData): boolean {
	return table.rows.some((row) => row.cells.some((cell) => cell.cellType === 'merged'));
}
