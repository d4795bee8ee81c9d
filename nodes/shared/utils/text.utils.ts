/**
 * ============================================================================
 * UTILITAIRES TEXTE - Nettoyage du texte des cellules
 * ============================================================================
 *
 * PROBLÈMES COURANTS RÉSOLUS :
 * - Les espaces insécables (non-breaking spaces) de Word
 * - Les caractères spéciaux de la Private Use Area (puces, symboles)
 * - Les caractères de contrôle invisibles
 * - Les espaces multiples consécutifs
 */

// ============================================================================
// NORMALISATION DU TEXTE
// ============================================================================

/**
 * Normalise une ligne de texte en supprimant les caractères spéciaux Word.
 *
 * CARACTÈRES SUPPRIMÉS OU REMPLACÉS :
 * - Private Use Area (U+E000-U+F8FF) : puces personnalisées, symboles Word
 * - Caractères de contrôle (U+0000-U+001F) : caractères invisibles
 * - Espaces insécables (U+00A0) : remplacés par des espaces normaux
 * - Espaces multiples : réduits à un seul espace
 *
 * @example
 * normalizeText('Nom\u00A0commercial');  // "Nom commercial"
 * normalizeText('\uE000Point de puce');  // "Point de puce"
 */
export function normalizeText(text: string): string {
	return text
		.replace(/[\uE000-\uF8FF]/g, '')
		.replace(/[\u0000-\u001F]/g, ' ')
		.replace(/\u00A0/g, ' ')
		.replace(/\s+/g, ' ')
		.trim();
}

/**
 * Normalise un texte multi-lignes ligne par ligne et retire les lignes vides.
 *
 * @example
 * normalizeMultilineText(' Ligne 1 \n\n Ligne 2 '); // 'Ligne 1\nLigne 2'
 */
export function normalizeMultilineText(text: string): string {
	return text
		.split('\n')
		.map((line) => normalizeText(line))
		.filter((line) => line !== '')
		.join('\n');
}

/**
 * Tronque un texte à une longueur maximale avec ellipse.
 *
 * @example
 * truncate('Un texte très long...', 10);  // 'Un texte t...'
 */
export function truncate(text: string, maxLength: number = 100): string {
	if (text.length <= maxLength) {
		return text;
	}
	return text.substring(0, maxLength) + '...';
}
