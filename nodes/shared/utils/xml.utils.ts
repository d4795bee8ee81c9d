/**
 * ============================================================================
 * UTILITAIRES XML - Lecture du XML Word des tableaux
 * ============================================================================
 *
 * Ce module contient les fonctions pour parcourir le XML des documents Word
 * (DOCX). Les fichiers DOCX sont des archives ZIP contenant des fichiers XML,
 * principalement word/document.xml.
 *
 * STRUCTURE XML D'UN TABLEAU (pour les développeurs juniors) :
 * ------------------------------------------------------------
 * - <w:tbl>   : Tableau (table)
 * - <w:tr>    : Ligne de tableau (table row)
 * - <w:tc>    : Cellule de tableau (table cell)
 * - <w:tcPr>  : Propriétés de cellule (fond, largeur, fusion)
 * - <w:p>     : Paragraphe (paragraph)
 * - <w:r>     : Run - une portion de texte avec un formatage uniforme
 * - <w:rPr>   : Propriétés de run (formatage du texte)
 * - <w:t>     : Texte brut (text)
 *
 * EXEMPLE DE STRUCTURE XML :
 * ```xml
 * <w:tbl>
 *   <w:tr>                              <!-- Ligne -->
 *     <w:tc>                            <!-- Cellule -->
 *       <w:tcPr><w:shd w:fill="D9E2F3"/></w:tcPr>
 *       <w:p>
 *         <w:r>
 *           <w:rPr><w:b/></w:rPr>       <!-- Gras -->
 *           <w:t>Nom</w:t>
 *         </w:r>
 *       </w:p>
 *     </w:tc>
 *   </w:tr>
 * </w:tbl>
 * ```
 *
 * Un tableau peut contenir d'autres tableaux dans ses cellules : les
 * éléments sont donc recherchés en tenant compte de l'imbrication.
 */

// ============================================================================
// RECHERCHE D'ÉLÉMENTS
// ============================================================================

/**
 * Retourne les éléments de premier niveau d'une balise, en tenant compte
 * de l'imbrication (un <w:tbl> dans un <w:tc> n'est pas de premier niveau).
 *
 * Les balises dont le nom commence pareil (<w:tblPr>, <w:trPr>, <w:tcPr>)
 * ne sont pas confondues avec la balise cherchée.
 *
 * @param xml - XML à parcourir
 * @param tagName - Nom qualifié de la balise (ex: "w:tbl")
 * @returns Le XML complet de chaque élément trouvé
 *
 * @example
 * findTopLevelElements('<w:tr><w:tc>A</w:tc><w:tc>B</w:tc></w:tr>', 'w:tc');
 * // ['<w:tc>A</w:tc>', '<w:tc>B</w:tc>']
 */
export function findTopLevelElements(xml: string, tagName: string): string[] {
	const elements: string[] = [];
	const tagRegex = new RegExp(`<(/?)${escapeRegExp(tagName)}(?=[\\s/>])[^>]*>`, 'g');

	let depth = 0;
	let start = -1;
	let match;

	while ((match = tagRegex.exec(xml)) !== null) {
		const isClosing = match[1] === '/';
		const isSelfClosing = !isClosing && match[0].endsWith('/>');

		if (isSelfClosing) {
			if (depth === 0) {
				elements.push(match[0]);
			}
			continue;
		}

		if (!isClosing) {
			if (depth === 0) {
				start = match.index;
			}
			depth++;
			continue;
		}

		// Balise fermante orpheline : ignorée
		if (depth === 0) continue;

		depth--;
		if (depth === 0 && start !== -1) {
			elements.push(xml.slice(start, match.index + match[0].length));
			start = -1;
		}
	}

	return elements;
}

// ============================================================================
// EXTRACTION DE TEXTE
// ============================================================================

/**
 * Extrait le texte visible d'un paragraphe Word.
 *
 * - <w:t> : texte
 * - <w:tab/> : tabulation, rendue par un espace
 * - <w:br/> et <w:cr/> : saut de ligne, rendu par "\n"
 *
 * @example
 * extractParagraphText('<w:p><w:r><w:t>Total</w:t><w:tab/><w:t>HT</w:t></w:r></w:p>');
 * // 'Total HT'
 */
export function extractParagraphText(paragraphXml: string): string {
	const parts: string[] = [];
	const tokenRegex = /<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>|<w:tab\s*\/>|<w:(?:br|cr)(?:\s[^>]*)?\/>/g;

	let match;
	while ((match = tokenRegex.exec(paragraphXml)) !== null) {
		if (match[1] !== undefined) {
			parts.push(decodeXmlEntities(match[1]));
		} else if (match[0].startsWith('<w:tab')) {
			parts.push(' ');
		} else {
			parts.push('\n');
		}
	}

	return parts.join('');
}

// ============================================================================
// ENTITÉS XML
// ============================================================================

const NAMED_ENTITIES: Record<string, string> = {
	amp: '&',
	lt: '<',
	gt: '>',
	quot: '"',
	apos: "'",
};

/**
 * Décode les entités XML (&amp;, &lt;, &#233;, &#xE9;...).
 *
 * @example
 * decodeXmlEntities('R&amp;D &#8211; 2024'); // 'R&D – 2024'
 */
export function decodeXmlEntities(value: string): string {
	return value.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (entity, body: string) => {
		if (body.startsWith('#x')) {
			return safeFromCodePoint(parseInt(body.slice(2), 16), entity);
		}
		if (body.startsWith('#')) {
			return safeFromCodePoint(parseInt(body.slice(1), 10), entity);
		}
		return NAMED_ENTITIES[body] ?? entity;
	});
}

function safeFromCodePoint(codePoint: number, fallback: string): string {
	if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
		return fallback;
	}
	return String.fromCodePoint(codePoint);
}

/**
 * Échappe les caractères spéciaux pour les inclure dans du XML ou du HTML.
 *
 * @example
 * escapeXml('A & B');   // "A &amp; B"
 * escapeXml('<tag>');   // "&lt;tag&gt;"
 */
export function escapeXml(value: string): string {
	return value
		.replace(/&/g, '&amp;') // & doit être premier
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
		.replace(/"/g, '&quot;')
		.replace(/'/g, '&apos;');
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
