/**
 * ============================================================================
 * ERREURS - Erreurs propagées par le moteur de tableaux
 * ============================================================================
 *
 * Le moteur n'a presque aucun cas d'échec : classification, détection
 * d'en-tête et fusions sont des fonctions totales. Seule une grille
 * impossible à parcourir (données non structurées reçues d'un nœud
 * précédent, par exemple) lève une TableExtractionError.
 *
 * L'appelant peut alors remplacer le tableau par un texte minimal
 * (voir createTableFallbackText) sans interrompre le reste du document.
 */

export class TableExtractionError extends Error {
	/** Position de l'élément fautif dans la grille, si connue */
	readonly location?: { row: number; col?: number };

	constructor(message: string, location?: { row: number; col?: number }) {
		super(message);
		this.name = 'TableExtractionError';
		if (location) {
			this.location = location;
		}
	}
}

/**
 * Texte de remplacement d'un tableau dont l'extraction a échoué.
 *
 * @example
 * createTableFallbackText(3); // '[Table with 3 rows]'
 */
export function createTableFallbackText(rowCount: number): string {
	return `[Table with ${rowCount} rows]`;
}
