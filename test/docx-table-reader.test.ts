import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import {
	extractDocxTables,
	parseTableCell,
	parseTableGrid,
	readDocxTableGrids,
} from '../nodes/DocxTableExtractor/services/docx-table-reader.service';
import { TableExtractionError } from '../nodes/shared/errors';
import { createDefaultConfig, createFullConfig } from '../nodes/shared/utils/table-config.utils';
import { cellXml, createDocxFromBodyXml, rowXml, tableXml } from './helpers';

const HEADER_CELL =
	'<w:tc><w:tcPr><w:shd w:val="clear" w:color="auto" w:fill="D9E2F3"/></w:tcPr>' +
	'<w:p><w:pPr><w:jc w:val="center"/></w:pPr><w:r><w:rPr><w:b/></w:rPr><w:t>Produit</w:t></w:r></w:p></w:tc>';

const PRICE_HEADER_CELL =
	'<w:tc><w:p><w:r><w:t xml:space="preserve">Prix </w:t></w:r><w:r><w:t>HT</w:t></w:r></w:p></w:tc>';

const PRODUCTS_TABLE = tableXml(
	rowXml(HEADER_CELL, PRICE_HEADER_CELL),
	rowXml(cellXml('Stylo'), cellXml('1.50')),
	rowXml(cellXml('Cahier', 'A4'), cellXml('3.20'))
);

const NESTED_TABLE = tableXml(
	rowXml(`<w:tc><w:p><w:r><w:t>Externe</w:t></w:r></w:p>${tableXml(rowXml(cellXml('Interne')))}</w:tc>`)
);

const BODY = `<w:p><w:r><w:t>Introduction</w:t></w:r></w:p>${PRODUCTS_TABLE}<w:p/>${NESTED_TABLE}`;

describe('readDocxTableGrids', () => {
	test('lit les tableaux de premier niveau avec texte et formatage', () => {
		const grids = readDocxTableGrids(`<w:document><w:body>${BODY}</w:body></w:document>`);

		assert.deepEqual(grids, [
			{
				tableId: 'table_1',
				grid: [
					[
						{
							text: 'Produit',
							formatting: { bold: true, italic: false, underline: false, backgroundColor: '#D9E2F3' },
							alignment: 'center',
						},
						{ text: 'Prix HT' },
					],
					[{ text: 'Stylo' }, { text: '1.50' }],
					[{ text: 'Cahier\nA4' }, { text: '3.20' }],
				],
			},
			{
				tableId: 'table_2',
				grid: [[{ text: 'Externe\nInterne' }]],
			},
		]);
	});

	test('retourne une liste vide sans tableau', () => {
		assert.deepEqual(readDocxTableGrids('<w:body><w:p/></w:body>'), []);
	});
});

describe('parseTableGrid', () => {
	test('lève une TableExtractionError sur une ligne non fermée', () => {
		assert.throws(
			() => parseTableGrid(`<w:tbl><w:tr>${cellXml('Cassé')}</w:tbl>`),
			(error: unknown) =>
				error instanceof TableExtractionError &&
				error.message === 'Aucune ligne <w:tr> complète dans le tableau'
		);
	});

	test('indique la ligne dont la cellule n\'est pas fermée', () => {
		assert.throws(
			() => parseTableGrid(`<w:tbl>${rowXml(cellXml('A'))}<w:tr><w:tc><w:p/></w:tr></w:tbl>`),
			(error: unknown) => error instanceof TableExtractionError && error.location?.row === 1
		);
	});
});

describe('parseTableCell', () => {
	test('décode les entités et rend les sauts de ligne', () => {
		const cell = parseTableCell('<w:tc><w:p><w:r><w:t>R&amp;D</w:t><w:br/><w:t>2024</w:t></w:r></w:p></w:tc>');
		assert.deepEqual(cell, { text: 'R&D\n2024' });
	});

	test('ignore les paragraphes vides', () => {
		const cell = parseTableCell('<w:tc><w:p/><w:p><w:r><w:t>  A  </w:t></w:r></w:p><w:p></w:p></w:tc>');
		assert.deepEqual(cell, { text: 'A' });
	});
});

describe('extractDocxTables', () => {
	test('extrait et analyse chaque tableau du document', () => {
		const result = extractDocxTables(createDocxFromBodyXml(BODY), createDefaultConfig());

		assert.equal(result.success, true);
		assert.deepEqual(result.warnings, []);
		assert.deepEqual(
			result.tables.map((extracted) => extracted.tableId),
			['table_1', 'table_2']
		);

		const products = result.tables[0].table;
		assert.ok(products);
		assert.equal(products.tableId, 'table_1');
		assert.deepEqual(products.headers, ['Produit', 'Prix HT']);
		assert.equal(products.rowCount, 3);
		assert.equal(products.columnCount, 2);
		assert.equal(products.rows[0].cells[0].formattedContent, 'Produit');

		const nested = result.tables[1].table;
		assert.ok(nested);
		assert.equal(nested.hasHeader, false);
		assert.equal(nested.rows[0].cells[0].content, 'Externe\nInterne');
	});

	test('conserve le formatage avec la configuration complète', () => {
		const result = extractDocxTables(createDocxFromBodyXml(PRODUCTS_TABLE), createFullConfig());
		const table = result.tables[0].table;

		assert.ok(table);
		assert.equal(table.hasHeader, true);
		assert.deepEqual(table.rows[0].cells[0], {
			content: 'Produit',
			formattedContent: '**Produit**',
			cellType: 'header',
			formatting: { bold: true, italic: false, underline: false, backgroundColor: '#D9E2F3' },
			alignment: 'center',
		});
	});

	test('remplace un tableau illisible sans bloquer les autres', () => {
		const body = PRODUCTS_TABLE + `<w:tbl><w:tr>${cellXml('Cassé')}</w:tbl>` + tableXml(rowXml(cellXml('Seul')));
		const result = extractDocxTables(createDocxFromBodyXml(body), createDefaultConfig());

		assert.equal(result.success, true);
		assert.deepEqual(
			result.tables.map((extracted) => extracted.tableId),
			['table_1', 'table_2', 'table_3']
		);
		assert.deepEqual(result.tables[0].table?.headers, ['Produit', 'Prix HT']);
		assert.deepEqual(result.tables[1], { tableId: 'table_2', fallbackText: '[Table with 1 rows]' });
		assert.equal(result.tables[2].table?.rows[0].cells[0].content, 'Seul');
		assert.deepEqual(result.warnings, [
			'table_2: extraction impossible (Aucune ligne <w:tr> complète dans le tableau), texte de remplacement utilisé',
		]);
	});

	test('signale un document illisible sans lever d\'erreur', () => {
		const result = extractDocxTables(Buffer.from('pas un docx'), createDefaultConfig());

		assert.equal(result.success, false);
		assert.deepEqual(result.tables, []);
		assert.match(result.error ?? '', /n'est pas un document DOCX valide/);
	});

	test('un document sans tableau donne une liste vide', () => {
		const result = extractDocxTables(createDocxFromBodyXml('<w:p><w:r><w:t>Texte</w:t></w:r></w:p>'), createDefaultConfig());

		assert.deepEqual(result, { success: true, tables: [], warnings: [] });
	});
});
