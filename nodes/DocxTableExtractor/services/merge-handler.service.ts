/**
 * ============================================================================
 * MERGE HANDLER SERVICE - Détection des cellules fusionnées
 * ============================================================================
 *
 * Les fusions sont déduites du contenu : une suite de cellules vides qui suit
 * immédiatement une cellule non vide est rattachée à celle-ci (l'ancre).
 * Les attributs Word gridSpan / vMerge ne sont PAS utilisés.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Horizontal : on parcourt chaque ligne de gauche à droite
 * - Vertical : on parcourt chaque colonne de haut en bas
 * - Les fusions horizontales sont détectées d'abord ; une cellule déjà prise
 *   par une fusion horizontale interrompt les fusions verticales
 *   (une cellule n'est fusionnée que sur un seul axe)
 * - Une cellule déjà 'merged' (passage précédent) n'ouvre ni ne prolonge
 *   aucune plage : relancer la détection ne change rien
 * - Seule l'ancre porte colspan / rowspan
 * - En mode 'expand', chaque plage connaît son ancre : on recopie son contenu
 *
 * @example
 * // Ligne ["D1", "", "D3"] → plage horizontale colonnes 0..1, D1.colspan = 2
 */

import type { MergeCellsHandling, MergedRange, TableCell, TableData } from '../../shared/types/table.types';
import { isCellEmpty, isCellMerged, setCellMerged } from '../../shared/utils/table-model.utils';

// ============================================================================
// FONCTION PRINCIPALE
// ============================================================================

/**
 * Applique la stratégie de fusion au tableau.
 *
 * @param table - Tableau à annoter (modifié sur place)
 * @param policy - 'ignore' | 'preserve' | 'expand'
 * @returns Les plages détectées (vide pour 'ignore')
 */
export function handleMergedCells(table: TableData, policy: MergeCellsHandling): MergedRange[] {
	switch (policy) {
		case 'ignore':
			return [];

		case 'preserve': {
			const ranges = detectMergedRanges(table);
			applyMergedRanges(table, ranges);
			return ranges;
		}

		case 'expand': {
			const ranges = detectMergedRanges(table);
			applyMergedRanges(table, ranges);
			expandMergedRanges(table, ranges);
			return ranges;
		}
	}
}

// ============================================================================
// DÉTECTION
// ============================================================================

/**
 * Détecte les plages fusionnées, horizontales puis verticales.
 */
export function detectMergedRanges(table: TableData): MergedRange[] {
	const horizontal = detectHorizontalRanges(table);

	// Cellules déjà rattachées à une fusion horizontale (ancre comprise)
	const claimed = new Set<string>();
	for (const range of horizontal) {
		for (let col = range.startCol; col <= range.endCol; col++) {
			claimed.add(cellKey(range.startRow, col));
		}
	}

	return [...horizontal, ...detectVerticalRanges(table, claimed)];
}

function detectHorizontalRanges(table: TableData): MergedRange[] {
	const ranges: MergedRange[] = [];

	table.rows.forEach((row, rowIndex) => {
		let anchorCol: number | null = null;
		let endCol = -1;

		const closeRun = () => {
			if (anchorCol !== null && endCol > anchorCol) {
				ranges.push({
					startRow: rowIndex,
					endRow: rowIndex,
					startCol: anchorCol,
					endCol,
					orientation: 'horizontal',
				});
			}
			anchorCol = null;
		};

		row.cells.forEach((cell, col) => {
			if (isCellMerged(cell) || !isCellEmpty(cell)) {
				closeRun();
				return;
			}

			if (anchorCol !== null) {
				endCol = col;
			} else if (col > 0 && isAnchorCandidate(row.cells[col - 1])) {
				anchorCol = col - 1;
				endCol = col;
			}
		});

		closeRun();
	});

	return ranges;
}

function detectVerticalRanges(table: TableData, claimed: Set<string>): MergedRange[] {
	const ranges: MergedRange[] = [];

	for (let col = 0; col < table.columnCount; col++) {
		let anchorRow: number | null = null;
		let endRow = -1;

		const closeRun = () => {
			if (anchorRow !== null && endRow > anchorRow) {
				ranges.push({
					startRow: anchorRow,
					endRow,
					startCol: col,
					endCol: col,
					orientation: 'vertical',
				});
			}
			anchorRow = null;
		};

		for (let rowIndex = 0; rowIndex < table.rows.length; rowIndex++) {
			const cell = table.rows[rowIndex].cells[col];

			// Ligne trop courte ou cellule déjà fusionnée : fin de la suite
			if (!cell || claimed.has(cellKey(rowIndex, col)) || isCellMerged(cell)) {
				closeRun();
				continue;
			}

			if (!isCellEmpty(cell)) {
				closeRun();
				continue;
			}

			if (anchorRow !== null) {
				endRow = rowIndex;
				continue;
			}

			const above = rowIndex > 0 ? table.rows[rowIndex - 1].cells[col] : undefined;
			if (above && isAnchorCandidate(above) && !claimed.has(cellKey(rowIndex - 1, col))) {
				anchorRow = rowIndex - 1;
				endRow = rowIndex;
			}
		}

		closeRun();
	}

	return ranges;
}

function cellKey(row: number, col: number): string {
	return `${row}:${col}`;
}

function isAnchorCandidate(cell: TableCell): boolean {
	return !isCellEmpty(cell) && !isCellMerged(cell);
}

// ============================================================================
// MARQUAGE ET EXPANSION
// ============================================================================

/**
 * Marque les cellules des plages : l'ancre reçoit le span, les autres
 * cellules sont 'merged' sans span.
 */
export function applyMergedRanges(table: TableData, ranges: MergedRange[]): void {
	for (const range of ranges) {
		if (range.orientation === 'horizontal') {
			const row = table.rows[range.startRow];
			if (!row) continue;

			for (let col = range.startCol; col <= range.endCol; col++) {
				const cell = row.cells[col];
				if (!cell) continue;

				if (col === range.startCol) {
					setCellMerged(cell, range.endCol - range.startCol + 1);
				} else {
					setCellMerged(cell);
				}
			}
		} else {
			for (let rowIndex = range.startRow; rowIndex <= range.endRow; rowIndex++) {
				const cell = table.rows[rowIndex]?.cells[range.startCol];
				if (!cell) continue;

				if (rowIndex === range.startRow) {
					setCellMerged(cell, undefined, range.endRow - range.startRow + 1);
				} else {
					setCellMerged(cell);
				}
			}
		}
	}
}

/**
 * Recopie le contenu de l'ancre dans les autres cellules de chaque plage.
 * Les cellules restent 'merged' ; le span reste sur l'ancre.
 */
export function expandMergedRanges(table: TableData, ranges: MergedRange[]): void {
	for (const range of ranges) {
		const anchor = table.rows[range.startRow]?.cells[range.startCol];
		if (!anchor) continue;

		for (let rowIndex = range.startRow; rowIndex <= range.endRow; rowIndex++) {
			for (let col = range.startCol; col <= range.endCol; col++) {
				if (rowIndex === range.startRow && col === range.startCol) continue;

				const cell = table.rows[rowIndex]?.cells[col];
				if (!cell) continue;

				cell.content = anchor.content;
				cell.formattedContent = anchor.formattedContent;
			}
		}
	}
}
