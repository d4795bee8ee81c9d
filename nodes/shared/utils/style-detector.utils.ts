/**
 * ============================================================================
 * DÉTECTEUR DE STYLES - Formatage des runs et des cellules DOCX
 * ============================================================================
 *
 * Ce fichier contient les utilitaires pour lire le formatage d'un tableau
 * Word : gras, italique, soulignement, police, couleurs, alignement.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Le formatage du texte est dans <w:rPr> (propriétés du run)
 * - Le fond d'une cellule est dans <w:tcPr><w:shd w:fill="..."/></w:tcPr>
 * - L'alignement est dans <w:pPr><w:jc w:val="..."/></w:pPr>
 */

import type { CellAlignment, CellFormatting } from '../types/table.types';

// ============================================================================
// DÉTECTION DES STYLES DE TEXTE
// ============================================================================

/**
 * Détecte si un run de texte est en gras.
 *
 * @param runXml - XML du run (<w:r>...</w:r>)
 * @returns true si le texte est en gras
 */
export function isBold(runXml: string): boolean {
	// <w:b/> ou <w:b w:val="true"/> ou <w:b w:val="1"/>
	return /<w:b(?:\s+w:val="(?:true|1|on)")?(?:\s*\/)?>/.test(runXml);
}

/**
 * Détecte si un run de texte est en italique.
 */
export function isItalic(runXml: string): boolean {
	return /<w:i(?:\s+w:val="(?:true|1|on)")?(?:\s*\/)?>/.test(runXml);
}

/**
 * Détecte si un run de texte est souligné.
 */
export function isUnderline(runXml: string): boolean {
	// <w:u w:val="single"/> ou autres valeurs de soulignement
	return /<w:u\s+w:val="(?!none)[^"]+"\s*\/?>/.test(runXml);
}

/**
 * Extrait la taille de police d'un run.
 *
 * @returns Taille en points ou null
 */
export function extractFontSize(runXml: string): number | null {
	// <w:sz w:val="24"/> - valeur en demi-points
	const match = runXml.match(/<w:sz\s+w:val="(\d+)"/);
	if (match) {
		return parseInt(match[1], 10) / 2;
	}
	return null;
}

/**
 * Extrait la couleur du texte d'un run.
 *
 * @returns Couleur hex (avec #) ou null
 */
export function extractTextColor(runXml: string): string | null {
	// <w:color w:val="FF0000"/>
	const match = runXml.match(/<w:color\s+w:val="([0-9A-Fa-f]{6})"/);
	return match ? `#${match[1].toUpperCase()}` : null;
}

/**
 * Extrait le nom de la police d'un run.
 */
export function extractFontFamily(runXml: string): string | null {
	// <w:rFonts w:ascii="Arial"/>
	const match = runXml.match(/<w:rFonts[^>]+w:ascii="([^"]+)"/);
	return match ? match[1] : null;
}

/**
 * Extrait la couleur de fond d'une cellule (ou d'un run surligné par <w:shd>).
 *
 * @returns Couleur hex (avec #) ou null ("auto" est ignoré)
 */
export function extractShadingFill(xml: string): string | null {
	// <w:shd w:val="clear" w:color="auto" w:fill="D9E2F3"/>
	const match = xml.match(/<w:shd\b[^>]*\sw:fill="([0-9A-Fa-f]{6})"/);
	return match ? `#${match[1].toUpperCase()}` : null;
}

/**
 * Lit le formatage d'un run. Seuls les attributs présents sont retournés.
 *
 * @example
 * extractRunFormatting('<w:r><w:rPr><w:b/><w:sz w:val="24"/></w:rPr><w:t>A</w:t></w:r>');
 * // { bold: true, fontSize: 12 }
 */
export function extractRunFormatting(runXml: string): Partial<CellFormatting> {
	const propsMatch = runXml.match(/<w:rPr>([\s\S]*?)<\/w:rPr>/);
	if (!propsMatch) return {};

	const props = propsMatch[1];
	const formatting: Partial<CellFormatting> = {};

	if (isBold(props)) formatting.bold = true;
	if (isItalic(props)) formatting.italic = true;
	if (isUnderline(props)) formatting.underline = true;

	const fontSize = extractFontSize(props);
	if (fontSize !== null) formatting.fontSize = fontSize;

	const fontFamily = extractFontFamily(props);
	if (fontFamily !== null) formatting.fontFamily = fontFamily;

	const textColor = extractTextColor(props);
	if (textColor !== null) formatting.textColor = textColor;

	return formatting;
}

// ============================================================================
// ANALYSE D'ALIGNEMENT
// ============================================================================

/**
 * Extrait l'alignement d'un paragraphe.
 *
 * @returns Alignement, ou null si le paragraphe n'en déclare pas
 */
export function extractAlignment(paragraphXml: string): CellAlignment | null {
	// <w:jc w:val="center"/>
	const match = paragraphXml.match(/<w:jc\s+w:val="([^"]+)"/);
	if (!match) return null;

	switch (match[1].toLowerCase()) {
		case 'center':
			return 'center';
		case 'right':
		case 'end':
			return 'right';
		case 'both':
		case 'justify':
		case 'distribute':
			return 'justify';
		default:
			return 'left';
	}
}
