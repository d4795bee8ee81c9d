/**
 * ============================================================================
 * TYPES EXTRACTION - Extraction des tableaux d'un document DOCX
 * ============================================================================
 *
 * Ce fichier contient les types relatifs à la lecture des tableaux d'un
 * document Word et au résultat renvoyé par le nœud DocxTableExtractor.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Chaque tableau du document passe par le moteur d'inférence
 * - Un tableau qui échoue est remplacé par un texte minimal, les autres
 *   tableaux continuent d'être traités
 */

import type { RawTableGrid, TableData } from './table.types';

// ============================================================================
// OPTIONS D'EXTRACTION
// ============================================================================

/**
 * Options pour l'extraction des tableaux d'un DOCX.
 *
 * @example
 * const options: DocxTableOptions = { debug: true };
 */
export interface DocxTableOptions {
	/** Affiche la progression dans la console */
	debug?: boolean;
}

// ============================================================================
// GRILLES BRUTES
// ============================================================================

/**
 * Tableau lu dans le XML, avant toute inférence.
 */
export interface DocxTableGrid {
	/** Identifiant du tableau dans le document (ex: "table_1") */
	tableId: string;

	/** Grille brute des cellules */
	grid: RawTableGrid;
}

// ============================================================================
// RÉSULTAT D'EXTRACTION
// ============================================================================

/**
 * Tableau extrait du document.
 *
 * Si l'inférence a échoué, `table` est absent et `fallbackText` contient
 * le texte de remplacement (ex: "[Table with 3 rows]").
 *
 * @example
 * {
 *   tableId: 'table_1',
 *   table: { rows: [...], hasHeader: true, headers: ['Nom', 'Email'], ... }
 * }
 */
export interface ExtractedDocxTable {
	tableId: string;
	table?: TableData;
	fallbackText?: string;
}

/**
 * Résultat de l'extraction des tableaux d'un document.
 */
export interface DocxTablesResult {
	/** Indique si le document a pu être lu */
	success: boolean;

	tables: ExtractedDocxTable[];

	/** Message d'erreur (si échec) */
	error?: string;

	/** Avertissements non bloquants (tableaux remplacés, etc.) */
	warnings: string[];
}
