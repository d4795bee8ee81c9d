/**
 * ============================================================================
 * CELL CLASSIFIER SERVICE - Type sémantique du contenu d'une cellule
 * ============================================================================
 *
 * Ce service déduit le type de données d'une cellule à partir de son texte :
 * vide, nombre, date, booléen ou texte.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - L'ordre des tests compte : le premier qui correspond gagne
 * - Les tests numériques passent AVANT les dates (un texte ambigu est un nombre)
 * - "0" et "1" sont des booléens par défaut (option numericBooleans)
 * - La fonction ne lève jamais d'erreur : au pire elle retourne 'text'
 */

import type { CellDataType } from '../../shared/types/table.types';

// ============================================================================
// VOCABULAIRES
// ============================================================================

const CURRENCY_SYMBOLS = ['$', '€', '¥', '£', '₹', '₽', '₩', '₪', '₦', '₡'];

const CURRENCY_CODES = ['USD', 'EUR', 'GBP', 'JPY', 'CNY', 'INR', 'RUB', 'KRW'];

const BOOLEAN_TOKENS = new Set([
	// Valeurs standard
	'true', 'false', 'yes', 'no',
	// Cases à cocher
	'✓', '✗', '☑', '☐', 'x', 'o',
	// Autres langues
	'是', '否', '有', '無', 'oui', 'non', 'да', 'нет',
]);

const NUMERIC_BOOLEAN_TOKENS = new Set(['0', '1']);

const RELATIVE_DATE_TERMS = [
	'today', 'tomorrow', 'yesterday', 'now',
	'今天', '明天', '昨天', '现在',
	"aujourd'hui", 'demain', 'hier',
	'сегодня', 'завтра', 'вчера',
];

const DATE_PATTERNS: RegExp[] = [
	// Dates numériques : MM/DD/YYYY, DD-MM-YY
	/^\d{1,2}[/-]\d{1,2}[/-]\d{2,4}$/,
	// YYYY/MM/DD, YYYY-MM-DD
	/^\d{4}[/-]\d{1,2}[/-]\d{1,2}$/,
	// ISO 8601 avec heure
	/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/,
	// DD.MM.YYYY
	/^\d{1,2}\.\d{1,2}\.\d{2,4}$/,
	// Date + heure : 12/25/2023 14:30(:00)
	/^\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\s+\d{1,2}:\d{2}(:\d{2})?$/,
	// Mois en toutes lettres : Dec 25, 2023 / 25 December 2023
	/^(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\s+\d{1,2},?\s+\d{2,4}$/i,
	/^\d{1,2}\s+(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\s+\d{2,4}$/i,
	// Heure seule : 14:30, 2:30:15 PM
	/^\d{1,2}:\d{2}(:\d{2})?(\s*(AM|PM))?$/i,
];

const RELATIVE_DATE_PATTERNS: RegExp[] = [
	/\b\d+\s+(day|week|month|year)s?\s+(ago|from now)\b/,
	/\b(last|next)\s+(week|month|year)\b/,
	/\b(this|past)\s+(week|month|year)\b/,
];

/**
 * Nombre flottant complet : signe, chiffres, décimales, exposant,
 * ou inf / infinity / nan.
 */
const FLOAT_REGEX = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf|infinity|nan)$/i;

// ============================================================================
// FONCTION PRINCIPALE
// ============================================================================

export interface CellClassifierOptions {
	/** Classer "0" et "1" comme booléens (true par défaut) */
	numericBooleans?: boolean;
}

/**
 * Déduit le type de données d'un texte de cellule.
 *
 * @example
 * classifyCellData('$1,234.56'); // 'number'
 * classifyCellData('2023-12-25'); // 'date'
 * classifyCellData('✓');          // 'boolean'
 * classifyCellData('1');          // 'boolean'
 * classifyCellData('1', { numericBooleans: false }); // 'number'
 */
export function classifyCellData(text: string, options: CellClassifierOptions = {}): CellDataType {
	const trimmed = text.trim();
	const numericBooleans = options.numericBooleans ?? true;

	if (!trimmed) {
		return 'empty';
	}

	// "0" / "1" : choix explicite, booléen avant nombre
	if (numericBooleans && NUMERIC_BOOLEAN_TOKENS.has(trimmed)) {
		return 'boolean';
	}

	if (isNumericValue(trimmed)) {
		return 'number';
	}

	if (isDateValue(trimmed)) {
		return 'date';
	}

	if (isBooleanValue(trimmed)) {
		return 'boolean';
	}

	return 'text';
}

// ============================================================================
// NOMBRES
// ============================================================================

/**
 * Le texte entier est-il un nombre flottant ?
 */
export function parsesAsFloat(text: string): boolean {
	return FLOAT_REGEX.test(text);
}

/**
 * Nombre sous toutes ses formes : brut, monétaire, pourcentage,
 * avec séparateurs de milliers ou en notation scientifique.
 */
export function isNumericValue(text: string): boolean {
	const cleaned = text.trim();

	return (
		parsesAsFloat(cleaned) ||
		isCurrencyValue(cleaned) ||
		isPercentageValue(cleaned) ||
		isFormattedNumber(cleaned) ||
		isScientificNotation(cleaned)
	);
}

/**
 * Montant monétaire : symbole en tête ou en fin ($100, 50€),
 * ou code devise séparé par un espace (USD 100, 100 EUR).
 */
export function isCurrencyValue(text: string): boolean {
	for (const symbol of CURRENCY_SYMBOLS) {
		if (text.startsWith(symbol) || text.endsWith(symbol)) {
			const numberPart = stripRepeated(text, symbol).trim();
			if (numberPart && parsesAsFloat(numberPart.replace(/,/g, ''))) {
				return true;
			}
		}
	}

	const parts = text.split(/\s+/);
	if (parts.length === 2) {
		const [first, second] = parts;
		if (CURRENCY_CODES.includes(first) && parsesAsFloat(second.replace(/,/g, ''))) {
			return true;
		}
		if (CURRENCY_CODES.includes(second) && parsesAsFloat(first.replace(/,/g, ''))) {
			return true;
		}
	}

	return false;
}

/**
 * Pourcentage : 50%, -0.25%, +12%
 */
export function isPercentageValue(text: string): boolean {
	if (!text.endsWith('%')) return false;

	const numberPart = text.replace(/%+$/, '');
	return numberPart.length > 0 && parsesAsFloat(numberPart);
}

/**
 * Nombre avec séparateurs de milliers : 1,000.50
 */
export function isFormattedNumber(text: string): boolean {
	if (!text.includes(',')) return false;

	return parsesAsFloat(text.replace(/,/g, ''));
}

/**
 * Notation scientifique : 1.23e-4, 6.02E23
 */
export function isScientificNotation(text: string): boolean {
	const lower = text.toLowerCase();
	return lower.includes('e') && parsesAsFloat(lower);
}

/**
 * Retire toutes les occurrences d'un symbole en tête et en fin de texte.
 */
function stripRepeated(text: string, symbol: string): string {
	let result = text;
	while (result.startsWith(symbol)) {
		result = result.slice(symbol.length);
	}
	while (result.endsWith(symbol)) {
		result = result.slice(0, result.length - symbol.length);
	}
	return result;
}

// ============================================================================
// DATES
// ============================================================================

/**
 * Date, date-heure, heure seule ou date relative.
 */
export function isDateValue(text: string): boolean {
	if (DATE_PATTERNS.some((pattern) => pattern.test(text))) {
		return true;
	}

	return isRelativeDate(text);
}

/**
 * Date relative : today, demain, вчера, "2 days ago", "next month"...
 * Les termes sont reconnus comme mots entiers ("now" ne correspond pas à "known").
 */
export function isRelativeDate(text: string): boolean {
	const lower = text.toLowerCase();

	for (const term of RELATIVE_DATE_TERMS) {
		if (containsWord(lower, term)) {
			return true;
		}
	}

	return RELATIVE_DATE_PATTERNS.some((pattern) => pattern.test(lower));
}

/**
 * Cherche un terme délimité par des non-lettres (fonctionne aussi pour
 * le cyrillique et le chinois).
 */
function containsWord(text: string, term: string): boolean {
	let index = text.indexOf(term);

	while (index !== -1) {
		const before = index > 0 ? text[index - 1] : '';
		const after = text.charAt(index + term.length);

		if (!isWordChar(before) && !isWordChar(after)) {
			return true;
		}

		index = text.indexOf(term, index + 1);
	}

	return false;
}

function isWordChar(char: string): boolean {
	// Les idéogrammes ne délimitent pas les mots : seuls lettres latines/cyrilliques et chiffres comptent
	return char !== '' && /[\p{Script=Latin}\p{Script=Cyrillic}\p{N}]/u.test(char);
}

// ============================================================================
// BOOLÉENS
// ============================================================================

/**
 * Booléen : true/false, yes/no, cases à cocher, 0/1, oui/non, да/нет...
 */
export function isBooleanValue(text: string): boolean {
	const lower = text.trim().toLowerCase();
	return BOOLEAN_TOKENS.has(lower) || NUMERIC_BOOLEAN_TOKENS.has(lower);
}
