/**
 * ============================================================================
 * DOCX TABLE EXTRACTOR - Nœud n8n pour extraire les tableaux d'un DOCX
 * ============================================================================
 *
 * Ce nœud lit les tableaux d'un document Word (ou une grille JSON fournie
 * par un nœud précédent) et produit pour chacun un tableau annoté :
 * en-tête détecté, cellules fusionnées marquées, rendu texte.
 *
 * FONCTIONNALITÉS :
 * - Détection automatique de la ligne d'en-tête (score de confiance)
 * - Détection des cellules fusionnées (ignore / preserve / expand)
 * - Conservation optionnelle du formatage (gras, italique, souligné)
 * - Rendu en texte brut, CSV, TSV, Markdown, HTML ou JSON
 *
 * ENTRÉES :
 * - Document DOCX (propriété binaire), ou
 * - Grille JSON (tableau de lignes de cellules)
 *
 * SORTIE :
 * - Un item par document (tous les tableaux) ou un item par tableau
 */

import {
	IDataObject,
	IExecuteFunctions,
	INodeExecutionData,
	INodeType,
	INodeTypeDescription,
	NodeOperationError,
} from 'n8n-workflow';

import type {
	ExtractedDocxTable,
	TableCell,
	TableData,
	TableExtractionConfig,
} from '../shared';

import {
	buildConfigFromNodeParameters,
	extractDocxTables,
	extractTable,
	parseRawTableGrid,
	renderTable,
} from './services';

// ============================================================================
// INTERFACES LOCALES
// ============================================================================

type OutputMode = 'perDocument' | 'perTable';

/**
 * Options du nœud extraites des paramètres.
 */
interface NodeOptions {
	outputMode: OutputMode;
	includeStructure: boolean;
	debug: boolean;
}

/**
 * Tableaux extraits d'un item, avant rendu.
 */
interface ExtractionOutcome {
	tables: ExtractedDocxTable[];
	warnings: string[];
	filename?: string;
}

// ============================================================================
// DÉFINITION DU NŒUD
// ============================================================================

export class DocxTableExtractor implements INodeType {
	description: INodeTypeDescription = {
		// Identification
		displayName: 'DOCX Table Extractor',
		name: 'docxTableExtractor',
		icon: 'file:docx.svg',
		group: ['transform'],
		version: 1,
		subtitle: '={{$parameter["sourceType"] === "json" ? "Grille JSON" : "Document DOCX"}}',

		description:
			"Extrait les tableaux d'un document DOCX : détection de l'en-tête, " +
			'des cellules fusionnées et rendu en texte, CSV, Markdown, HTML ou JSON.',

		defaults: {
			name: 'DOCX Table Extractor',
		},

		inputs: [{ displayName: '', type: 'main' as const }],
		outputs: [{ displayName: '', type: 'main' as const }],

		properties: [
			// ==================== SOURCE ====================
			{
				displayName: 'Source',
				name: 'sourceType',
				type: 'options',
				options: [
					{
						name: 'Document DOCX',
						value: 'binary',
						description: 'Lit tous les tableaux du document Word en entrée',
					},
					{
						name: 'Grille JSON',
						value: 'json',
						description:
							'Traite une grille déjà extraite : tableau de lignes, chaque cellule étant un texte ' +
							'ou un objet { text, formatting?, alignment? }',
					},
				],
				default: 'binary',
			},
			{
				displayName: 'Propriété Binaire',
				name: 'binaryProperty',
				type: 'string',
				default: 'data',
				required: true,
				displayOptions: {
					show: { sourceType: ['binary'] },
				},
				description: 'Nom de la propriété binaire contenant le document DOCX.',
			},
			{
				displayName: 'Champ de la Grille',
				name: 'gridField',
				type: 'string',
				default: 'grid',
				required: true,
				displayOptions: {
					show: { sourceType: ['json'] },
				},
				description: 'Nom du champ JSON contenant la grille (ex: [["Nom", "Age"], ["Jean", "25"]]).',
				placeholder: 'ex: grid, rows',
			},

			// ==================== CONFIGURATION ====================
			{
				displayName: 'Préréglage',
				name: 'preset',
				type: 'options',
				options: [
					{
						name: 'Par Défaut',
						value: 'default',
						description: 'En-têtes détectés, fusions marquées, cellules vides retirées, texte brut',
					},
					{
						name: 'Simple',
						value: 'simple',
						description: 'Texte seul : ni en-tête, ni fusion, ni formatage',
					},
					{
						name: 'Complet',
						value: 'full',
						description: 'Toutes les analyses, formatage et cellules vides conservés, sortie JSON',
					},
					{
						name: 'Personnalisé',
						value: 'custom',
						description: 'Part de la configuration par défaut et applique les réglages ci-dessous',
					},
				],
				default: 'default',
			},
			{
				displayName: 'Réglages',
				name: 'config',
				type: 'collection',
				placeholder: 'Ajouter un réglage',
				default: {},
				options: [
					{
						displayName: 'Mode',
						name: 'mode',
						type: 'options',
						options: [
							{ name: 'Simple', value: 'simple' },
							{ name: 'Structuré', value: 'structured' },
							{ name: 'Formaté', value: 'formatted' },
							{ name: 'Complet', value: 'full' },
						],
						default: 'structured',
						description: 'Niveau de fidélité attendu en sortie',
					},
					{
						displayName: 'Détecter les En-têtes',
						name: 'detectHeaders',
						type: 'boolean',
						default: true,
						description: 'Si activé, la première ligne est analysée pour savoir si elle est un en-tête',
					},
					{
						displayName: 'Conserver le Formatage',
						name: 'preserveFormatting',
						type: 'boolean',
						default: false,
						description: 'Si activé, le gras, l\'italique et le soulignement sont conservés (balisage Markdown)',
					},
					{
						displayName: 'Inclure les Cellules Vides',
						name: 'includeEmptyCells',
						type: 'boolean',
						default: false,
						description: 'Si désactivé, les cellules vides sont retirées des lignes',
					},
					{
						displayName: 'Cellules Fusionnées',
						name: 'mergeCellsHandling',
						type: 'options',
						options: [
							{ name: 'Ignorer', value: 'ignore', description: 'Aucune détection' },
							{ name: 'Marquer', value: 'preserve', description: 'Marque les plages fusionnées' },
							{
								name: 'Développer',
								value: 'expand',
								description: "Marque les plages et recopie le texte de l'ancre",
							},
						],
						default: 'preserve',
					},
					{
						displayName: 'Format de Sortie',
						name: 'outputFormat',
						type: 'options',
						options: [
							{ name: 'Texte Brut', value: 'plainText' },
							{ name: 'CSV', value: 'csv' },
							{ name: 'TSV', value: 'tsv' },
							{ name: 'Markdown', value: 'markdown' },
							{ name: 'JSON', value: 'json' },
							{ name: 'HTML', value: 'html' },
						],
						default: 'plainText',
					},
				],
			},

			// ==================== OPTIONS ====================
			{
				displayName: 'Options',
				name: 'options',
				type: 'collection',
				placeholder: 'Ajouter une option',
				default: {},
				options: [
					{
						displayName: 'Mode de Sortie',
						name: 'outputMode',
						type: 'options',
						options: [
							{
								name: 'Un Item par Document',
								value: 'perDocument',
								description: 'Tous les tableaux dans un seul item',
							},
							{
								name: 'Un Item par Tableau',
								value: 'perTable',
								description: 'Un item de sortie pour chaque tableau',
							},
						],
						default: 'perDocument',
					},
					{
						displayName: 'Inclure la Structure',
						name: 'includeStructure',
						type: 'boolean',
						default: false,
						description: 'Inclut le tableau annoté complet (lignes, cellules, types) en plus du rendu',
					},
					{
						displayName: 'Mode Debug',
						name: 'debug',
						type: 'boolean',
						default: false,
						description: "Affiche la progression de l'extraction dans la console",
					},
				],
			},
		],
	};

	// ============================================================================
	// EXÉCUTION DU NŒUD
	// ============================================================================

	async execute(this: IExecuteFunctions): Promise<INodeExecutionData[][]> {
		const items = this.getInputData();
		const returnData: INodeExecutionData[] = [];

		for (let itemIndex = 0; itemIndex < items.length; itemIndex++) {
			try {
				const results = await processItem(this, itemIndex, items[itemIndex]);
				returnData.push(...results);
			} catch (error) {
				if (this.continueOnFail()) {
					returnData.push({
						json: {
							success: false,
							error: (error as Error).message,
						},
						pairedItem: { item: itemIndex },
					});
				} else {
					throw error;
				}
			}
		}

		return [returnData];
	}
}

// ============================================================================
// FONCTIONS DE TRAITEMENT
// ============================================================================

/**
 * Traite un item individuel.
 */
async function processItem(
	ctx: IExecuteFunctions,
	itemIndex: number,
	item: INodeExecutionData
): Promise<INodeExecutionData[]> {
	// ============================================================
	// ÉTAPE 1: Récupérer les paramètres
	// ============================================================

	const sourceType = ctx.getNodeParameter('sourceType', itemIndex) as string;
	const config = extractConfig(ctx, itemIndex);
	const options = extractOptions(ctx, itemIndex);

	// ============================================================
	// ÉTAPE 2: Extraire les tableaux
	// ============================================================

	const { tables, warnings, filename } =
		sourceType === 'json'
			? extractFromGrid(ctx, itemIndex, item, config)
			: await extractFromDocument(ctx, itemIndex, item, config, options);

	// ============================================================
	// ÉTAPE 3: Préparer la sortie
	// ============================================================

	const tableOutputs = tables.map((extracted) => tableToOutput(extracted, config, options));

	if (options.outputMode === 'perTable') {
		return tableOutputs.map((json) => ({
			json: filename ? { filename, ...json } : json,
			pairedItem: { item: itemIndex },
		}));
	}

	const jsonOutput: IDataObject = {
		success: true,
		tableCount: tables.length,
		outputFormat: config.outputFormat,
		tables: tableOutputs,
		warnings,
	};
	if (filename) {
		jsonOutput.filename = filename;
	}

	return [{ json: jsonOutput, pairedItem: { item: itemIndex } }];
}

/**
 * Lit tous les tableaux du document DOCX de l'item.
 */
async function extractFromDocument(
	ctx: IExecuteFunctions,
	itemIndex: number,
	item: INodeExecutionData,
	config: TableExtractionConfig,
	options: NodeOptions
): Promise<ExtractionOutcome> {
	const binaryProperty = ctx.getNodeParameter('binaryProperty', itemIndex) as string;
	const binaryData = item.binary;

	if (!binaryData || !binaryData[binaryProperty]) {
		throw new NodeOperationError(
			ctx.getNode(),
			`Aucun document trouvé dans la propriété binaire "${binaryProperty}". ` +
				"Assurez-vous qu'un document DOCX est connecté en entrée.",
			{ itemIndex }
		);
	}

	const documentBuffer = await ctx.helpers.getBinaryDataBuffer(itemIndex, binaryProperty);
	const filename = binaryData[binaryProperty].fileName || 'document.docx';

	const result = extractDocxTables(documentBuffer, config, { debug: options.debug });
	if (!result.success) {
		throw new NodeOperationError(ctx.getNode(), result.error ?? 'Lecture du document impossible', {
			itemIndex,
		});
	}

	return { tables: result.tables, warnings: result.warnings, filename };
}

/**
 * Traite la grille JSON de l'item comme un tableau unique.
 */
function extractFromGrid(
	ctx: IExecuteFunctions,
	itemIndex: number,
	item: INodeExecutionData,
	config: TableExtractionConfig
): ExtractionOutcome {
	const gridField = ctx.getNodeParameter('gridField', itemIndex) as string;
	const value = item.json[gridField];

	if (value === undefined) {
		throw new NodeOperationError(
			ctx.getNode(),
			`Le champ "${gridField}" n'existe pas. ` +
				'Il doit contenir une grille (ex: [["Nom", "Age"], ["Jean", "25"]]).',
			{ itemIndex }
		);
	}

	try {
		const grid = parseRawTableGrid(value);
		const table = extractTable(grid, config, { tableId: 'table_1' });
		return { tables: [{ tableId: 'table_1', table }], warnings: [] };
	} catch (error) {
		throw new NodeOperationError(
			ctx.getNode(),
			`La grille du champ "${gridField}" est invalide : ${(error as Error).message}`,
			{ itemIndex }
		);
	}
}

// ============================================================================
// FONCTIONS UTILITAIRES
// ============================================================================

/**
 * Construit la configuration du moteur à partir du préréglage et des réglages.
 */
function extractConfig(ctx: IExecuteFunctions, itemIndex: number): TableExtractionConfig {
	const preset = ctx.getNodeParameter('preset', itemIndex) as string;
	const overrides = ctx.getNodeParameter('config', itemIndex, {}) as IDataObject;

	try {
		return buildConfigFromNodeParameters(preset, overrides);
	} catch (error) {
		throw new NodeOperationError(ctx.getNode(), (error as Error).message, { itemIndex });
	}
}

/**
 * Extrait les options du nœud.
 */
function extractOptions(ctx: IExecuteFunctions, itemIndex: number): NodeOptions {
	const options = ctx.getNodeParameter('options', itemIndex, {}) as {
		outputMode?: OutputMode;
		includeStructure?: boolean;
		debug?: boolean;
	};

	return {
		outputMode: options.outputMode || 'perDocument',
		includeStructure: options.includeStructure || false,
		debug: options.debug || false,
	};
}

/**
 * Convertit un tableau extrait en sortie JSON n8n.
 */
function tableToOutput(
	extracted: ExtractedDocxTable,
	config: TableExtractionConfig,
	options: NodeOptions
): IDataObject {
	const { tableId, table, fallbackText } = extracted;

	if (!table) {
		return { tableId, success: false, rendered: fallbackText ?? '' };
	}

	const output: IDataObject = {
		tableId,
		success: true,
		hasHeader: table.hasHeader,
		rowCount: table.rowCount,
		columnCount: table.columnCount,
		rendered: renderTable(table, config.outputFormat),
	};

	if (table.headers) {
		output.headers = table.headers;
	}
	if (options.includeStructure) {
		output.structure = structureToJson(table);
	}

	return output;
}

function structureToJson(table: TableData): IDataObject {
	return {
		tableId: table.tableId,
		title: table.title,
		hasHeader: table.hasHeader,
		headers: table.headers,
		rowCount: table.rowCount,
		columnCount: table.columnCount,
		rows: table.rows.map((row) => ({
			rowIndex: row.rowIndex,
			isHeader: row.isHeader,
			cells: row.cells.map(cellToJson),
		})),
	};
}

function cellToJson(cell: TableCell): IDataObject {
	const json: IDataObject = {
		content: cell.content,
		formattedContent: cell.formattedContent,
		cellType: cell.cellType,
	};

	if (cell.colspan !== undefined) json.colspan = cell.colspan;
	if (cell.rowspan !== undefined) json.rowspan = cell.rowspan;
	if (cell.alignment) json.alignment = cell.alignment;
	if (cell.formatting) json.formatting = { ...cell.formatting };

	return json;
}
