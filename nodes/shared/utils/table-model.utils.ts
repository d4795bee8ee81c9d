/**
 * ============================================================================
 * UTILITAIRES MODÈLE - Construction et lecture des tableaux
 * ============================================================================
 *
 * Fonctions de tenue du modèle TableData / TableRow / TableCell.
 * Aucune inférence ici : uniquement des compteurs, des accès et des
 * changements d'état simples.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Le vide d'une cellule se déduit TOUJOURS de son contenu (isCellEmpty)
 * - Après toute modification des lignes, appeler updateStatistics
 */

import type {
	CellFormatting,
	TableCell,
	TableData,
	TableMetadata,
	TableRow,
} from '../types/table.types';

// ============================================================================
// TABLEAU
// ============================================================================

/**
 * Crée un tableau vide.
 *
 * @example
 * const table = createTableData({ tableId: 'table_1' });
 * // { rows: [], hasHeader: false, columnCount: 0, rowCount: 0, tableId: 'table_1' }
 */
export function createTableData(meta: TableMetadata = {}): TableData {
	const table: TableData = {
		rows: [],
		hasHeader: false,
		columnCount: 0,
		rowCount: 0,
	};

	if (meta.tableId !== undefined) {
		table.tableId = meta.tableId;
	}
	if (meta.title !== undefined) {
		table.title = meta.title;
	}

	return table;
}

/**
 * Ajoute une ligne au tableau et met à jour les compteurs.
 */
export function addRow(table: TableData, row: TableRow): void {
	table.rows.push(row);
	updateStatistics(table);
}

/**
 * Recalcule rowCount et columnCount depuis les lignes.
 * C'est le seul endroit où ces deux champs sont calculés.
 */
export function updateStatistics(table: TableData): void {
	table.rowCount = table.rows.length;
	table.columnCount = table.rows.reduce((max, row) => Math.max(max, row.cells.length), 0);
}

export function isTableEmpty(table: TableData): boolean {
	return table.rows.length === 0;
}

/**
 * Retourne une cellule par position, ou undefined hors limites.
 */
export function getCell(table: TableData, row: number, col: number): TableCell | undefined {
	return table.rows[row]?.cells[col];
}

export function getRow(table: TableData, row: number): TableRow | undefined {
	return table.rows[row];
}

/**
 * Retourne la colonne demandée, ligne par ligne.
 * Les lignes trop courtes donnent undefined.
 */
export function getColumn(table: TableData, col: number): (TableCell | undefined)[] {
	return table.rows.map((row) => row.cells[col]);
}

/**
 * Définit les en-têtes du tableau.
 */
export function setHeaders(table: TableData, headers: string[]): void {
	table.hasHeader = true;
	table.headers = headers;
}

// ============================================================================
// LIGNE
// ============================================================================

export function createTableRow(rowIndex: number): TableRow {
	return {
		cells: [],
		isHeader: false,
		rowIndex,
	};
}

export function addCell(row: TableRow, cell: TableCell): void {
	row.cells.push(cell);
}

/**
 * Marque la ligne comme en-tête (la ligne et ses cellules).
 * Une cellule déjà fusionnée reste 'merged'.
 */
export function markRowAsHeader(row: TableRow): void {
	row.isHeader = true;
	for (const cell of row.cells) {
		if (isCellMerged(cell)) continue;
		cell.cellType = 'header';
	}
}

/**
 * Une ligne est vide si elle n'a pas de cellule ou si toutes sont vides.
 */
export function isRowEmpty(row: TableRow): boolean {
	return row.cells.every((cell) => isCellEmpty(cell));
}

export function nonEmptyCells(row: TableRow): TableCell[] {
	return row.cells.filter((cell) => !isCellEmpty(cell));
}

// ============================================================================
// CELLULE
// ============================================================================

/**
 * Crée une cellule à partir de son texte.
 * Le texte est trimé ; un texte vide donne une cellule 'empty'.
 *
 * @example
 * createTableCell('  Total ');   // { content: 'Total', formattedContent: 'Total', cellType: 'data' }
 * createTableCell('   ');        // { content: '', formattedContent: '', cellType: 'empty' }
 */
export function createTableCell(content: string, formatting?: CellFormatting): TableCell {
	const trimmed = content.trim();

	if (!trimmed) {
		const empty = createEmptyCell();
		if (formatting) {
			empty.formatting = formatting;
		}
		return empty;
	}

	const cell: TableCell = {
		content: trimmed,
		formattedContent: trimmed,
		cellType: 'data',
	};

	if (formatting) {
		cell.formatting = formatting;
	}

	return cell;
}

export function createEmptyCell(): TableCell {
	return {
		content: '',
		formattedContent: '',
		cellType: 'empty',
	};
}

export function isCellEmpty(cell: TableCell): boolean {
	return cell.content.trim() === '';
}

export function isCellMerged(cell: TableCell): boolean {
	return cell.cellType === 'merged';
}

export function isCellHeader(cell: TableCell): boolean {
	return cell.cellType === 'header';
}

/**
 * Marque une cellule comme fusionnée. Le span n'est porté que par l'ancre.
 */
export function setCellMerged(cell: TableCell, colspan?: number, rowspan?: number): void {
	cell.cellType = 'merged';
	delete cell.colspan;
	delete cell.rowspan;

	if (colspan !== undefined) {
		cell.colspan = colspan;
	}
	if (rowspan !== undefined) {
		cell.rowspan = rowspan;
	}
}

/**
 * Longueur du contenu en caractères (points de code, pas en unités UTF-16).
 */
export function contentLength(cell: TableCell): number {
	return Array.from(cell.content).length;
}

// ============================================================================
// FORMATAGE
// ============================================================================

export function createFormatting(partial: Partial<CellFormatting> = {}): CellFormatting {
	return {
		bold: false,
		italic: false,
		underline: false,
		...partial,
	};
}

/**
 * Indique si au moins un attribut de formatage est présent.
 */
export function hasFormatting(formatting: CellFormatting | undefined): boolean {
	if (!formatting) return false;

	return (
		formatting.bold ||
		formatting.italic ||
		formatting.underline ||
		formatting.backgroundColor !== undefined ||
		formatting.textColor !== undefined ||
		formatting.fontSize !== undefined ||
		formatting.fontFamily !== undefined
	);
}

/**
 * Applique le formatage au texte avec un balisage de type Markdown.
 *
 * @example
 * applyFormattingToText(createFormatting({ bold: true, italic: true }), 'Total');
 * // '***Total***'
 */
export function applyFormattingToText(formatting: CellFormatting, text: string): string {
	if (!text) return text;

	let result = text;

	if (formatting.bold) {
		result = `**${result}**`;
	}
	if (formatting.italic) {
		result = `*${result}*`;
	}
	if (formatting.underline) {
		result = `__${result}__`;
	}

	return result;
}

/**
 * Fusionne deux formatages : les booléens s'additionnent (OU),
 * les valeurs optionnelles de overlay remplacent celles de base.
 */
export function mergeFormatting(base: CellFormatting, overlay: Partial<CellFormatting>): CellFormatting {
	const merged: CellFormatting = {
		bold: base.bold || overlay.bold === true,
		italic: base.italic || overlay.italic === true,
		underline: base.underline || overlay.underline === true,
	};

	const backgroundColor = overlay.backgroundColor ?? base.backgroundColor;
	const textColor = overlay.textColor ?? base.textColor;
	const fontSize = overlay.fontSize ?? base.fontSize;
	const fontFamily = overlay.fontFamily ?? base.fontFamily;

	// Pas de clés à undefined dans la sortie JSON
	if (backgroundColor !== undefined) merged.backgroundColor = backgroundColor;
	if (textColor !== undefined) merged.textColor = textColor;
	if (fontSize !== undefined) merged.fontSize = fontSize;
	if (fontFamily !== undefined) merged.fontFamily = fontFamily;

	return merged;
}
