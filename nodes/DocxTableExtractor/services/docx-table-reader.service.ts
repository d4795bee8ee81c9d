/**
 * ============================================================================
 * DOCX TABLE READER SERVICE - Lecture des tableaux d'un document DOCX
 * ============================================================================
 *
 * Ce service lit les tableaux de word/document.xml, construit une grille
 * brute par tableau (texte + formatage de chaque cellule) et la fait passer
 * dans le moteur d'inférence (table-extractor.service).
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Les tableaux DOCX utilisent <w:tbl>, <w:tr> (ligne), <w:tc> (cellule)
 * - Une cellule contient un ou plusieurs paragraphes <w:p> : on les joint
 *   avec un saut de ligne
 * - Un tableau imbriqué dans une cellule n'est pas extrait séparément ;
 *   son texte reste dans la cellule qui le contient
 * - Les fusions Word (gridSpan / vMerge) ne sont PAS lues : le moteur les
 *   déduit des cellules vides
 */

import type {
	DocxTableGrid,
	DocxTableOptions,
	DocxTablesResult,
	ExtractedDocxTable,
} from '../../shared/types/extraction.types';
import type {
	CellAlignment,
	RawTableCell,
	TableExtractionConfig,
} from '../../shared/types/table.types';
import { createTableFallbackText, TableExtractionError } from '../../shared/errors';
import { loadDocxDocumentXml } from '../../shared/utils/docx.utils';
import {
	extractAlignment,
	extractRunFormatting,
	extractShadingFill,
} from '../../shared/utils/style-detector.utils';
import { createFormatting, hasFormatting, mergeFormatting } from '../../shared/utils/table-model.utils';
import { normalizeMultilineText, truncate } from '../../shared/utils/text.utils';
import { extractParagraphText, findTopLevelElements } from '../../shared/utils/xml.utils';
import { extractTable } from './table-extractor.service';

// ============================================================================
// FONCTION PRINCIPALE
// ============================================================================

/**
 * Extrait et analyse tous les tableaux d'un document DOCX.
 *
 * Ne lève pas d'erreur : un document illisible donne success = false,
 * un tableau illisible est remplacé par "[Table with N rows]" et signalé
 * dans warnings, les autres tableaux sont extraits normalement.
 *
 * @param docxBuffer - Buffer contenant le fichier DOCX
 * @param config - Configuration du moteur
 * @param options - Options de lecture
 *
 * @example
 * const result = extractDocxTables(buffer, createDefaultConfig());
 * if (result.success) {
 *   console.log(result.tables[0].table?.headers);
 * }
 */
export function extractDocxTables(
	docxBuffer: Buffer,
	config: TableExtractionConfig,
	options: DocxTableOptions = {}
): DocxTablesResult {
	const { debug = false } = options;
	const warnings: string[] = [];

	if (debug) {
		console.log('\n📋 Extraction des tableaux DOCX en cours...');
	}

	let tableXmls: string[];
	try {
		const { xml } = loadDocxDocumentXml(docxBuffer);
		tableXmls = findTopLevelElements(xml, 'w:tbl');
	} catch (error) {
		return {
			success: false,
			tables: [],
			error: (error as Error).message,
			warnings,
		};
	}

	if (debug) {
		console.log(`   Tableaux trouvés: ${tableXmls.length}`);
	}

	const tables: ExtractedDocxTable[] = tableXmls.map((tableXml, index) => {
		const tableId = createTableId(index);

		try {
			const table = extractTable(parseTableGrid(tableXml), config, { tableId });

			if (debug) {
				const headerInfo = table.headers ? truncate(table.headers.join(' | '), 60) : 'aucun';
				console.log(`   ${tableId}: ${table.rowCount} lignes, ${table.columnCount} colonnes, en-tête: ${headerInfo}`);
			}

			return { tableId, table };
		} catch (error) {
			// Un tableau en échec ne doit pas interrompre le reste du document
			warnings.push(`${tableId}: extraction impossible (${(error as Error).message}), texte de remplacement utilisé`);

			if (debug) {
				console.log(`   ⚠️ ${tableId}: remplacé par un texte minimal`);
			}

			return { tableId, fallbackText: createTableFallbackText(countRowTags(tableXml)) };
		}
	});

	if (debug) {
		console.log('   Extraction terminée.\n');
	}

	return {
		success: true,
		tables,
		warnings,
	};
}

// ============================================================================
// LECTURE DU XML
// ============================================================================

/**
 * Lit les tableaux de premier niveau du XML et construit leurs grilles brutes.
 *
 * @param xml - Contenu XML de word/document.xml
 * @throws TableExtractionError si un tableau ne peut pas être parcouru
 *
 * @example
 * const grids = readDocxTableGrids(xml);
 * // [{ tableId: 'table_1', grid: [[{ text: 'Nom' }, { text: 'Age' }], ...] }]
 */
export function readDocxTableGrids(xml: string): DocxTableGrid[] {
	return findTopLevelElements(xml, 'w:tbl').map((tableXml, index) => ({
		tableId: createTableId(index),
		grid: parseTableGrid(tableXml),
	}));
}

/**
 * Parse un tableau XML en grille brute (une entrée par <w:tr>, une par <w:tc>).
 *
 * @throws TableExtractionError si le tableau n'a aucune ligne complète,
 * ou si une ligne n'a aucune cellule complète (balise non fermée par exemple)
 */
export function parseTableGrid(tableXml: string): RawTableCell[][] {
	const rows = findTopLevelElements(innerXml(tableXml), 'w:tr');
	if (rows.length === 0) {
		throw new TableExtractionError('Aucune ligne <w:tr> complète dans le tableau');
	}

	return rows.map((rowXml, rowIndex) => {
		const cells = findTopLevelElements(innerXml(rowXml), 'w:tc');
		if (cells.length === 0) {
			throw new TableExtractionError(`Aucune cellule <w:tc> complète en ligne ${rowIndex}`, {
				row: rowIndex,
			});
		}

		return cells.map((cellXml) => parseTableCell(cellXml));
	});
}

/**
 * Parse une cellule : texte des paragraphes, formatage des runs et de la cellule.
 *
 * @example
 * parseTableCell('<w:tc><w:p><w:r><w:rPr><w:b/></w:rPr><w:t>Nom</w:t></w:r></w:p></w:tc>');
 * // { text: 'Nom', formatting: { bold: true, italic: false, underline: false } }
 */
export function parseTableCell(cellXml: string): RawTableCell {
	const paragraphs = cellXml.match(/<w:p(?=[\s>])[^>]*>[\s\S]*?<\/w:p>/g) ?? [];

	const text = paragraphs
		.map((paragraphXml) => normalizeMultilineText(extractParagraphText(paragraphXml)))
		.filter((paragraphText) => paragraphText !== '')
		.join('\n');

	const cell: RawTableCell = { text };

	const formatting = extractCellFormatting(cellXml);
	if (hasFormatting(formatting)) {
		cell.formatting = formatting;
	}

	const alignment = findAlignment(paragraphs);
	if (alignment) {
		cell.alignment = alignment;
	}

	return cell;
}

/**
 * Combine le formatage de tous les runs de la cellule et son fond.
 */
function extractCellFormatting(cellXml: string) {
	const runs = cellXml.match(/<w:r(?=[\s>])[^>]*>[\s\S]*?<\/w:r>/g) ?? [];

	let formatting = createFormatting();
	for (const runXml of runs) {
		formatting = mergeFormatting(formatting, extractRunFormatting(runXml));
	}

	const cellProps = cellXml.match(/<w:tcPr>([\s\S]*?)<\/w:tcPr>/);
	const fill = cellProps ? extractShadingFill(cellProps[1]) : null;
	if (fill) {
		formatting = mergeFormatting(formatting, { backgroundColor: fill });
	}

	return formatting;
}

function findAlignment(paragraphs: string[]): CellAlignment | null {
	for (const paragraphXml of paragraphs) {
		const alignment = extractAlignment(paragraphXml);
		if (alignment) return alignment;
	}
	return null;
}

function createTableId(index: number): string {
	return `table_${index + 1}`;
}

/**
 * Nombre de balises <w:tr> ouvrantes, pour le texte de remplacement d'un
 * tableau qui n'a pas pu être parcouru.
 */
function countRowTags(tableXml: string): number {
	return (tableXml.match(/<w:tr(?=[\s>])[^>]*>/g) ?? []).length;
}

/**
 * Retourne le contenu d'un élément, sans ses balises ouvrante et fermante.
 */
function innerXml(elementXml: string): string {
	const openEnd = elementXml.indexOf('>');
	const closeStart = elementXml.lastIndexOf('</');

	if (openEnd === -1 || closeStart <= openEnd) return '';
	return elementXml.slice(openEnd + 1, closeStart);
}
