/**
 * ============================================================================
 * TABLE RENDERER SERVICE - Rendu des tableaux extraits
 * ============================================================================
 *
 * Ce service convertit un TableData en texte dans le format demandé par la
 * configuration (outputFormat) : texte brut, CSV, TSV, Markdown, HTML, JSON.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Les rendus ne modifient jamais le tableau
 * - Une cellule fusionnée sans span est "couverte" par son ancre : en HTML
 *   elle n'est pas émise, l'ancre porte colspan / rowspan
 * - Les autres formats sont positionnels : chaque valeur est placée dans sa
 *   colonne réelle (voir layoutRows). Une position couverte reprend la
 *   cellule couverte si le filtrage l'a gardée (texte recopié en 'expand'),
 *   sinon elle reste vide
 */

import type { TableCell, TableData, TableOutputFormat, TableRow } from '../../shared/types/table.types';
import { escapeXml } from '../../shared/utils/xml.utils';

// ============================================================================
// FONCTION PRINCIPALE
// ============================================================================

/**
 * Rend un tableau dans le format demandé.
 *
 * @example
 * renderTable(table, 'csv');
 * // 'Nom,Age\nJean,25'
 */
export function renderTable(table: TableData, format: TableOutputFormat): string {
	switch (format) {
		case 'plainText':
			return renderPlainText(table);
		case 'csv':
			return renderDelimited(table, ',');
		case 'tsv':
			return renderDelimited(table, '\t');
		case 'markdown':
			return renderMarkdown(table);
		case 'html':
			return renderHtml(table);
		case 'json':
			return renderJson(table);
	}
}

// ============================================================================
// CONVERSIONS
// ============================================================================

/**
 * Contenu des cellules, ligne par ligne.
 */
export function tableToMatrix(table: TableData): string[][] {
	return table.rows.map((row) => row.cells.map((cell) => cell.content));
}

/**
 * Convertit les lignes de données en objets indexés par les en-têtes.
 * Un en-tête vide devient "column_N". Sans en-tête, retourne un tableau vide.
 *
 * @example
 * tableToRecords(table);
 * // [{ Nom: 'Jean', Age: '25' }, { Nom: 'Marie', Age: '30' }]
 */
export function tableToRecords(table: TableData): Record<string, string>[] {
	const headers = table.headers;
	if (!table.hasHeader || !headers) return [];

	return dataValues(table, layoutRows(table, (cell) => cell.content)).map((values) => {
		const obj: Record<string, string> = {};

		for (let i = 0; i < headers.length; i++) {
			const key = headers[i] || `column_${i + 1}`;
			obj[key] = values[i] ?? '';
		}

		return obj;
	});
}

/**
 * Place chaque cellule dans sa colonne réelle.
 *
 * Une ancre occupe colspan colonnes, et rowspan lignes dans sa colonne.
 * Chaque position couverte consomme la cellule couverte suivante si elle
 * est présente, sinon vaut ''.
 *
 * @example
 * // Ligne [D1 (colspan 2), D3] après filtrage des cellules vides
 * layoutRows(table, (cell) => cell.content)[1];
 * // ['D1', '', 'D3']
 */
export function layoutRows(table: TableData, pick: (cell: TableCell) => string): string[][] {
	// Lignes encore couvertes par un rowspan, par colonne
	const coveredBelow: number[] = [];

	return table.rows.map((row) => {
		const values: string[] = [];
		let index = 0;

		const takeCovered = (): string => {
			const next = row.cells[index];
			if (next && isCoveredCell(next)) {
				index++;
				return pick(next);
			}
			return '';
		};

		while (index < row.cells.length) {
			const col = values.length;

			if ((coveredBelow[col] ?? 0) > 0) {
				coveredBelow[col]--;
				values.push(takeCovered());
				continue;
			}

			const cell = row.cells[index];
			index++;
			values.push(pick(cell));

			if (cell.rowspan !== undefined && cell.rowspan > 1) {
				coveredBelow[col] = cell.rowspan - 1;
			}
			for (let span = 1; span < (cell.colspan ?? 1); span++) {
				values.push(takeCovered());
			}
		}

		// Colonnes couvertes au-delà de la dernière cellule de la ligne
		for (let col = values.length; col < coveredBelow.length; col++) {
			if ((coveredBelow[col] ?? 0) > 0) {
				coveredBelow[col]--;
			}
		}

		return values;
	});
}

// ============================================================================
// RENDUS
// ============================================================================

/**
 * Texte brut : en-têtes, ligne de tirets, puis une ligne par ligne de données.
 */
export function renderPlainText(table: TableData): string {
	const lines: string[] = [];

	if (table.headers && table.headers.length > 0) {
		lines.push(table.headers.join(' | '));
		lines.push('-'.repeat(table.headers.length * 10));
	}

	for (const values of dataValues(table, layoutRows(table, (cell) => cell.content))) {
		if (values.every((value) => value === '')) continue;
		lines.push(values.join(' | '));
	}

	return lines.join('\n').trim();
}

/**
 * CSV (délimiteur ",") ou TSV (délimiteur "\t"), ligne d'en-tête incluse.
 */
export function renderDelimited(table: TableData, delimiter: string): string {
	return layoutRows(table, (cell) => cell.content)
		.map((values) => values.map((value) => quoteField(value, delimiter)).join(delimiter))
		.join('\n');
}

/**
 * Tableau Markdown. Les cellules utilisent le contenu formaté (**gras**, etc.).
 */
export function renderMarkdown(table: TableData): string {
	const layout = layoutRows(table, (cell) => cell.formattedContent);
	const width = Math.max(
		table.columnCount,
		table.headers?.length ?? 0,
		...layout.map((values) => values.length),
		1
	);

	let headerCells: string[];
	let bodyRows: string[][];

	if (table.headers && table.headers.length > 0) {
		headerCells = table.headers;
		bodyRows = dataValues(table, layout);
	} else if (layout.length > 0) {
		headerCells = layout[0];
		bodyRows = layout.slice(1);
	} else {
		headerCells = [];
		bodyRows = [];
	}

	const header = padCells(headerCells, width, (index) => `Column ${index + 1}`);
	const lines = [
		markdownLine(header),
		markdownLine(header.map(() => '---')),
		...bodyRows.map((values) => markdownLine(padCells(values, width, () => ''))),
	];

	return lines.join('\n');
}

/**
 * Tableau HTML avec <thead> si le tableau a un en-tête.
 */
export function renderHtml(table: TableData): string {
	const lines: string[] = ['<table>'];
	const headerRows = table.rows.filter((row) => row.isHeader);
	const bodyRows = table.rows.filter((row) => !row.isHeader);

	if (table.hasHeader && headerRows.length > 0) {
		lines.push('\t<thead>');
		for (const row of headerRows) {
			lines.push(htmlRow(row, 'th'));
		}
		lines.push('\t</thead>');
	}

	lines.push('\t<tbody>');
	for (const row of table.hasHeader ? bodyRows : table.rows) {
		lines.push(htmlRow(row, 'td'));
	}
	lines.push('\t</tbody>');
	lines.push('</table>');

	return lines.join('\n');
}

/**
 * JSON indenté avec une tabulation.
 */
export function renderJson(table: TableData): string {
	const output: Record<string, unknown> = {};

	if (table.tableId !== undefined) output.tableId = table.tableId;
	if (table.title !== undefined) output.title = table.title;

	output.hasHeader = table.hasHeader;
	if (table.headers) output.headers = table.headers;
	output.rowCount = table.rowCount;
	output.columnCount = table.columnCount;
	output.rows = tableToMatrix(table);

	if (table.hasHeader && table.headers) {
		output.records = tableToRecords(table);
	}

	return JSON.stringify(output, null, '\t');
}

// ============================================================================
// FONCTIONS UTILITAIRES
// ============================================================================

/**
 * Valeurs positionnées des lignes qui ne sont pas des en-têtes.
 */
function dataValues(table: TableData, layout: string[][]): string[][] {
	return layout.filter((_values, index) => !table.rows[index].isHeader);
}

function isCoveredCell(cell: TableCell): boolean {
	return cell.cellType === 'merged' && cell.colspan === undefined && cell.rowspan === undefined;
}

function quoteField(value: string, delimiter: string): string {
	if (value.includes(delimiter) || /["\r\n]/.test(value)) {
		return `"${value.replace(/"/g, '""')}"`;
	}
	return value;
}

function padCells(cells: string[], width: number, filler: (index: number) => string): string[] {
	const padded = cells.slice();
	for (let i = padded.length; i < width; i++) {
		padded.push(filler(i));
	}
	return padded;
}

function markdownLine(cells: string[]): string {
	const escaped = cells.map((cell) => cell.replace(/\|/g, '\\|').replace(/\r?\n/g, '<br>'));
	return `| ${escaped.join(' | ')} |`;
}

function htmlRow(row: TableRow, tag: 'th' | 'td'): string {
	const cells: string[] = [];

	for (const cell of row.cells) {
		// Cellule couverte par une ancre
		if (isCoveredCell(cell)) continue;

		let attributes = '';
		if (cell.colspan !== undefined) attributes += ` colspan="${cell.colspan}"`;
		if (cell.rowspan !== undefined) attributes += ` rowspan="${cell.rowspan}"`;
		if (cell.alignment) attributes += ` style="text-align:${cell.alignment}"`;

		cells.push(`<${tag}${attributes}>${escapeXml(cell.content)}</${tag}>`);
	}

	return `\t\t<tr>${cells.join('')}</tr>`;
}
