import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import {
	detectMergedRanges,
	handleMergedCells,
} from '../nodes/DocxTableExtractor/services/merge-handler.service';
import { buildTableData } from '../nodes/DocxTableExtractor/services/table-extractor.service';
import { createSimpleConfig } from '../nodes/shared/utils/table-config.utils';
import type { RawTableGrid } from '../nodes/shared/types/table.types';

const config = createSimpleConfig();

const GRID: RawTableGrid = [
	['H1', 'H2', 'H3'],
	['D1', '', 'D3'],
	['D4', 'D5', 'D6'],
];

const VERTICAL_GRID: RawTableGrid = [
	['Région', 'Ville'],
	['', 'Lyon'],
	['', 'Grenoble'],
];

describe('detectMergedRanges', () => {
	test('détecte une fusion horizontale après une cellule non vide', () => {
		const table = buildTableData(GRID, config);

		assert.deepEqual(detectMergedRanges(table), [
			{ startRow: 1, endRow: 1, startCol: 0, endCol: 1, orientation: 'horizontal' },
		]);
	});

	test('détecte une fusion verticale sous une cellule non vide', () => {
		const table = buildTableData(VERTICAL_GRID, config);

		assert.deepEqual(detectMergedRanges(table), [
			{ startRow: 0, endRow: 2, startCol: 0, endCol: 0, orientation: 'vertical' },
		]);
	});

	test('une cellule vide en première colonne n\'ouvre pas de fusion horizontale', () => {
		const table = buildTableData([['', 'A'], ['B', 'C']], config);

		assert.deepEqual(detectMergedRanges(table), []);
	});

	test('une ligne trop courte interrompt une fusion verticale', () => {
		const table = buildTableData([['A', 'B'], ['C'], ['', '']], config);

		assert.deepEqual(detectMergedRanges(table), [
			{ startRow: 1, endRow: 2, startCol: 0, endCol: 0, orientation: 'vertical' },
		]);
	});
});

describe('handleMergedCells', () => {
	test('preserve : l\'ancre reçoit colspan, la cellule couverte est fusionnée sans span', () => {
		const table = buildTableData(GRID, config);
		const ranges = handleMergedCells(table, 'preserve');

		assert.equal(ranges.length, 1);
		assert.deepEqual(table.rows[1].cells[0], {
			content: 'D1',
			formattedContent: 'D1',
			cellType: 'merged',
			colspan: 2,
		});
		assert.deepEqual(table.rows[1].cells[1], {
			content: '',
			formattedContent: '',
			cellType: 'merged',
		});
		assert.equal(table.rows[1].cells[2].cellType, 'data');
	});

	test('preserve : une fusion verticale porte rowspan sur l\'ancre', () => {
		const table = buildTableData(VERTICAL_GRID, config);
		handleMergedCells(table, 'preserve');

		assert.equal(table.rows[0].cells[0].rowspan, 3);
		assert.equal(table.rows[0].cells[0].colspan, undefined);
		assert.equal(table.rows[1].cells[0].cellType, 'merged');
		assert.equal(table.rows[2].cells[0].rowspan, undefined);
	});

	test('expand : recopie le texte de l\'ancre dans les cellules couvertes', () => {
		const table = buildTableData(VERTICAL_GRID, config);
		handleMergedCells(table, 'expand');

		assert.deepEqual(
			table.rows.map((row) => row.cells[0].content),
			['Région', 'Région', 'Région']
		);
		assert.equal(table.rows[2].cells[0].cellType, 'merged');
	});

	test('ignore : ne détecte rien et ne modifie rien', () => {
		const table = buildTableData(GRID, config);
		const before = structuredClone(table);

		assert.deepEqual(handleMergedCells(table, 'ignore'), []);
		assert.deepEqual(table, before);
	});

	test('relancer la détection ne défait aucune fusion', () => {
		const table = buildTableData(GRID, config);
		handleMergedCells(table, 'expand');
		const before = structuredClone(table);

		handleMergedCells(table, 'expand');

		assert.deepEqual(table, before);
	});

	test('une cellule déjà fusionnée ne devient pas l\'ancre d\'une nouvelle plage', () => {
		const table = buildTableData([['A', ''], ['', '']], config);
		handleMergedCells(table, 'expand');
		const before = structuredClone(table);

		assert.equal(table.rows[0].cells[1].content, 'A');
		assert.deepEqual(detectMergedRanges(table), []);

		handleMergedCells(table, 'expand');

		assert.deepEqual(table, before);
		assert.equal(table.rows[0].cells[0].colspan, 2);
		assert.equal(table.rows[0].cells[0].rowspan, undefined);
	});
});
