/**
 * ============================================================================
 * TYPES TABLEAUX - Modèle de données du moteur d'inférence de tableaux
 * ============================================================================
 *
 * Ce fichier contient les types du moteur qui analyse la grille brute d'un
 * tableau Word : détection de l'en-tête, des cellules fusionnées et du type
 * de données de chaque cellule.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Un tableau (TableData) contient des lignes (TableRow) qui contiennent
 *   des cellules (TableCell)
 * - Les lignes peuvent avoir des longueurs différentes
 * - columnCount et rowCount sont recalculés par updateStatistics, jamais
 *   modifiés à la main
 * - Une cellule est vide si et seulement si son contenu (trimé) est vide
 */

// ============================================================================
// CELLULES
// ============================================================================

/**
 * Rôle d'une cellule dans le tableau.
 */
export type CellType = 'header' | 'data' | 'merged' | 'empty';

/**
 * Alignement horizontal du texte d'une cellule.
 */
export type CellAlignment = 'left' | 'center' | 'right' | 'justify';

/**
 * Type sémantique déduit du texte d'une cellule.
 */
export type CellDataType = 'empty' | 'number' | 'date' | 'boolean' | 'text';

/**
 * Informations de formatage d'une cellule.
 *
 * @example
 * const formatting: CellFormatting = { bold: true, italic: false, underline: false, fontSize: 11 };
 */
export interface CellFormatting {
	bold: boolean;
	italic: boolean;
	underline: boolean;

	/** Couleur de fond (hex, ex: "#D9E2F3") */
	backgroundColor?: string;

	/** Couleur du texte (hex, ex: "#FF0000") */
	textColor?: string;

	/** Taille de police en points */
	fontSize?: number;

	/** Nom de la police */
	fontFamily?: string;
}

/**
 * Cellule d'un tableau.
 */
export interface TableCell {
	/** Texte brut trimé */
	content: string;

	/** Texte avec le balisage du formatage (copie de content par défaut) */
	formattedContent: string;

	cellType: CellType;

	/** Nombre de colonnes couvertes (ancre d'une fusion horizontale) */
	colspan?: number;

	/** Nombre de lignes couvertes (ancre d'une fusion verticale) */
	rowspan?: number;

	alignment?: CellAlignment;

	formatting?: CellFormatting;
}

// ============================================================================
// LIGNES ET TABLEAUX
// ============================================================================

/**
 * Ligne d'un tableau.
 */
export interface TableRow {
	cells: TableCell[];
	isHeader: boolean;

	/** Position de la ligne (attribuée à l'insertion, jamais renumérotée) */
	rowIndex: number;
}

/**
 * Tableau annoté produit par le moteur.
 *
 * @example
 * const table: TableData = {
 *   rows: [...],
 *   headers: ['Nom', 'Age'],
 *   hasHeader: true,
 *   columnCount: 2,
 *   rowCount: 3,
 *   tableId: 'table_1'
 * };
 */
export interface TableData {
	rows: TableRow[];

	/** En-têtes détectés (définis uniquement par le détecteur d'en-tête) */
	headers?: string[];
	hasHeader: boolean;

	/** La détection d'en-tête a déjà été appliquée, même sans résultat */
	headerDetected?: boolean;

	columnCount: number;
	rowCount: number;

	tableId?: string;
	title?: string;
}

/**
 * Champs transmis tels quels au tableau construit.
 */
export interface TableMetadata {
	tableId?: string;
	title?: string;
}

// ============================================================================
// FUSIONS
// ============================================================================

export type MergeOrientation = 'horizontal' | 'vertical';

/**
 * Plage fusionnée détectée (structure de travail, jamais stockée dans TableData).
 * L'ancre est toujours la cellule (startRow, startCol).
 */
export interface MergedRange {
	startRow: number;
	endRow: number;
	startCol: number;
	endCol: number;
	orientation: MergeOrientation;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Niveau de fidélité attendu par les rendus.
 * Ne conditionne pas directement les algorithmes du moteur.
 */
export type TableExtractionMode = 'simple' | 'structured' | 'formatted' | 'full';

/**
 * Stratégie de traitement des cellules fusionnées.
 * - ignore : aucune détection
 * - preserve : marque les plages sans toucher au contenu
 * - expand : marque puis recopie le contenu de l'ancre
 */
export type MergeCellsHandling = 'ignore' | 'preserve' | 'expand';

export type TableOutputFormat = 'plainText' | 'csv' | 'tsv' | 'markdown' | 'json' | 'html';

/**
 * Configuration de l'extraction (valeur immuable).
 */
export interface TableExtractionConfig {
	readonly mode: TableExtractionMode;
	readonly detectHeaders: boolean;
	readonly preserveFormatting: boolean;
	readonly includeEmptyCells: boolean;
	readonly mergeCellsHandling: MergeCellsHandling;
	readonly outputFormat: TableOutputFormat;
}

// ============================================================================
// ENTRÉE BRUTE
// ============================================================================

/**
 * Cellule brute fournie par le lecteur de document.
 */
export interface RawTableCell {
	text: string;
	formatting?: Partial<CellFormatting>;
	alignment?: CellAlignment;
}

/**
 * Grille brute : lignes de cellules (texte seul ou cellule enrichie).
 * Les lignes peuvent avoir des longueurs différentes.
 */
export type RawTableGrid = ReadonlyArray<ReadonlyArray<string | RawTableCell>>;
