import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import {
	layoutRows,
	renderDelimited,
	renderHtml,
	renderJson,
	renderMarkdown,
	renderPlainText,
	renderTable,
	tableToMatrix,
	tableToRecords,
} from '../nodes/DocxTableExtractor/services/table-renderer.service';
import {
	buildTableData,
	extractTable,
} from '../nodes/DocxTableExtractor/services/table-extractor.service';
import {
	createDefaultConfig,
	createSimpleConfig,
	withConfig,
} from '../nodes/shared/utils/table-config.utils';
import { markRowAsHeader, setHeaders } from '../nodes/shared/utils/table-model.utils';
import type { RawTableGrid } from '../nodes/shared/types/table.types';

const EMPLOYEES: RawTableGrid = [
	['Name', 'Age', 'Department'],
	['John', '25', 'Eng'],
	['Jane', '30', 'Mkt'],
];

const employees = () => extractTable(EMPLOYEES, createDefaultConfig(), { tableId: 'table_1' });

const STAFF: RawTableGrid = [
	['Name', 'Age', 'Dept'],
	['Jonathan Smith', '', 'Engineering'],
	['Jane Doe', '30', 'Marketing'],
];

describe('cellules fusionnées', () => {
	const staff = () => extractTable(STAFF, createDefaultConfig());
	const expandedStaff = () =>
		extractTable(STAFF, withConfig(createDefaultConfig(), { mergeCellsHandling: 'expand' }));

	test('l\'ancre occupe ses colonnes après filtrage de la cellule couverte', () => {
		const table = staff();

		assert.deepEqual(table.headers, ['Name', 'Age', 'Dept']);
		assert.equal(table.rows[1].cells.length, 2);
		assert.deepEqual(layoutRows(table, (cell) => cell.content)[1], ['Jonathan Smith', '', 'Engineering']);
	});

	test('Markdown, CSV et enregistrements gardent chaque valeur sous sa colonne', () => {
		const table = staff();

		assert.equal(
			renderMarkdown(table),
			[
				'| Name | Age | Dept |',
				'| --- | --- | --- |',
				'| Jonathan Smith |  | Engineering |',
				'| Jane Doe | 30 | Marketing |',
			].join('\n')
		);
		assert.equal(renderDelimited(table, ','), 'Name,Age,Dept\nJonathan Smith,,Engineering\nJane Doe,30,Marketing');
		assert.deepEqual(tableToRecords(table), [
			{ Name: 'Jonathan Smith', Age: '', Dept: 'Engineering' },
			{ Name: 'Jane Doe', Age: '30', Dept: 'Marketing' },
		]);
	});

	test('en mode expand, les colonnes couvertes reprennent le texte de l\'ancre', () => {
		const table = expandedStaff();

		assert.equal(
			renderDelimited(table, ','),
			'Name,Age,Dept\nJonathan Smith,Jonathan Smith,Engineering\nJane Doe,30,Marketing'
		);
		assert.deepEqual(tableToRecords(table)[0], {
			Name: 'Jonathan Smith',
			Age: 'Jonathan Smith',
			Dept: 'Engineering',
		});
	});

	test('une ancre verticale décale les lignes qu\'elle couvre', () => {
		const config = withConfig(createDefaultConfig(), { detectHeaders: false });
		const table = extractTable(
			[
				['a', 'b'],
				['c', 'd'],
				['', 'e'],
			],
			config
		);

		assert.equal(table.rows[1].cells[0].rowspan, 2);
		assert.equal(renderDelimited(table, ','), 'a,b\nc,d\n,e');
		assert.equal(renderPlainText(table), 'a | b\nc | d\n | e');
	});
});

describe('renderPlainText', () => {
	test('écrit les en-têtes, une ligne de tirets puis les données', () => {
		assert.equal(
			renderPlainText(employees()),
			'Name | Age | Department\n' + '-'.repeat(30) + '\nJohn | 25 | Eng\nJane | 30 | Mkt'
		);
	});

	test('saute les lignes vides', () => {
		const config = withConfig(createSimpleConfig(), { includeEmptyCells: true });
		const table = extractTable([['a', 'b'], ['', ''], ['c', 'd']], config);

		assert.equal(renderPlainText(table), 'a | b\nc | d');
	});
});

describe('renderDelimited', () => {
	const tricky = () =>
		extractTable(
			[
				['a,b', 'dit "bonjour"'],
				['x\ny', 'z'],
			],
			createSimpleConfig()
		);

	test('CSV : met entre guillemets les champs qui le nécessitent', () => {
		assert.equal(renderDelimited(tricky(), ','), '"a,b","dit ""bonjour"""\n"x\ny",z');
	});

	test('TSV : la virgule ne nécessite pas de guillemets', () => {
		assert.equal(renderDelimited(tricky(), '\t'), 'a,b\t"dit ""bonjour"""\n"x\ny"\tz');
	});

	test('inclut la ligne d\'en-tête', () => {
		assert.equal(renderTable(employees(), 'csv'), 'Name,Age,Department\nJohn,25,Eng\nJane,30,Mkt');
	});
});

describe('renderMarkdown', () => {
	test('utilise les en-têtes détectés', () => {
		assert.equal(
			renderMarkdown(employees()),
			[
				'| Name | Age | Department |',
				'| --- | --- | --- |',
				'| John | 25 | Eng |',
				'| Jane | 30 | Mkt |',
			].join('\n')
		);
	});

	test('sans en-tête, prend la première ligne et complète les lignes courtes', () => {
		const table = extractTable([['a|b', 'c'], ['d']], createSimpleConfig());

		assert.equal(renderMarkdown(table), '| a\\|b | c |\n| --- | --- |\n| d |  |');
	});

	test('utilise le contenu formaté', () => {
		const config = withConfig(createSimpleConfig(), { preserveFormatting: true });
		const table = extractTable([['Titre'], [{ text: 'Total', formatting: { bold: true } }]], config);

		assert.equal(renderMarkdown(table), '| Titre |\n| --- |\n| **Total** |');
	});

	test('un tableau vide reçoit des libellés de colonne', () => {
		assert.equal(renderMarkdown(extractTable([])), '| Column 1 |\n| --- |');
	});
});

describe('renderHtml', () => {
	test('place l\'en-tête dans <thead>', () => {
		assert.equal(
			renderHtml(employees()),
			[
				'<table>',
				'\t<thead>',
				'\t\t<tr><th>Name</th><th>Age</th><th>Department</th></tr>',
				'\t</thead>',
				'\t<tbody>',
				'\t\t<tr><td>John</td><td>25</td><td>Eng</td></tr>',
				'\t\t<tr><td>Jane</td><td>30</td><td>Mkt</td></tr>',
				'\t</tbody>',
				'</table>',
			].join('\n')
		);
	});

	test('porte colspan sur l\'ancre et omet la cellule couverte', () => {
		const config = withConfig(createDefaultConfig(), { includeEmptyCells: true, detectHeaders: false });
		const table = extractTable(
			[
				['H1', 'H2', 'H3'],
				['D1', '', 'D3'],
				['D4', 'D5', 'D6'],
			],
			config
		);

		assert.equal(
			renderHtml(table),
			[
				'<table>',
				'\t<tbody>',
				'\t\t<tr><td>H1</td><td>H2</td><td>H3</td></tr>',
				'\t\t<tr><td colspan="2">D1</td><td>D3</td></tr>',
				'\t\t<tr><td>D4</td><td>D5</td><td>D6</td></tr>',
				'\t</tbody>',
				'</table>',
			].join('\n')
		);
	});

	test('échappe le texte et rend l\'alignement', () => {
		const config = withConfig(createSimpleConfig(), { preserveFormatting: true });
		const table = extractTable([[{ text: '<b> & co', alignment: 'right' }]], config);

		assert.equal(
			renderHtml(table),
			'<table>\n\t<tbody>\n\t\t<tr><td style="text-align:right">&lt;b&gt; &amp; co</td></tr>\n\t</tbody>\n</table>'
		);
	});
});

describe('renderJson', () => {
	test('contient la grille et les enregistrements', () => {
		const json = renderJson(employees());

		assert.ok(json.startsWith('{\n\t"tableId": "table_1",\n\t"hasHeader": true,'));
		assert.deepEqual(JSON.parse(json), {
			tableId: 'table_1',
			hasHeader: true,
			headers: ['Name', 'Age', 'Department'],
			rowCount: 3,
			columnCount: 3,
			rows: [
				['Name', 'Age', 'Department'],
				['John', '25', 'Eng'],
				['Jane', '30', 'Mkt'],
			],
			records: [
				{ Name: 'John', Age: '25', Department: 'Eng' },
				{ Name: 'Jane', Age: '30', Department: 'Mkt' },
			],
		});
	});

	test('omet les enregistrements sans en-tête', () => {
		const table = extractTable([['1', '2']], createSimpleConfig());

		assert.deepEqual(JSON.parse(renderTable(table, 'json')), {
			hasHeader: false,
			rowCount: 1,
			columnCount: 2,
			rows: [['1', '2']],
		});
	});
});

describe('conversions', () => {
	test('tableToRecords nomme les colonnes sans en-tête', () => {
		const table = buildTableData(
			[
				['Nom', ''],
				['Jean', '25'],
			],
			createSimpleConfig()
		);
		setHeaders(table, ['Nom', '']);
		markRowAsHeader(table.rows[0]);

		assert.deepEqual(tableToRecords(table), [{ Nom: 'Jean', column_2: '25' }]);
	});

	test('tableToRecords retourne une liste vide sans en-tête', () => {
		assert.deepEqual(tableToRecords(extractTable([['a']], createSimpleConfig())), []);
	});

	test('tableToMatrix retourne le contenu brut', () => {
		assert.deepEqual(tableToMatrix(extractTable([['a', 'b'], ['c']], createSimpleConfig())), [['a', 'b'], ['c']]);
	});
});
