/**
 * ============================================================================
 * UTILITAIRES DOCX - Ouverture des documents Word
 * ============================================================================
 *
 * Un DOCX est une archive ZIP ; le contenu principal est dans
 * word/document.xml. L'archive est ouverte avec PizZip.
 */

import PizZip from 'pizzip';

// ============================================================================
// CHARGEMENT DE DOCUMENTS
// ============================================================================

/**
 * Charge un document DOCX et retourne son XML principal.
 *
 * @param buffer - Le buffer du fichier DOCX
 * @returns L'archive et le XML de word/document.xml
 * @throws Error si le fichier n'est pas un DOCX valide
 *
 * @example
 * const { xml } = loadDocxDocumentXml(buffer);
 * // xml contient le contenu de word/document.xml
 */
export function loadDocxDocumentXml(buffer: Buffer): { zip: PizZip; xml: string } {
	let zip: PizZip;
	try {
		zip = new PizZip(buffer);
	} catch (error) {
		throw new Error(
			"Le fichier fourni n'est pas un document DOCX valide " +
				`(archive ZIP corrompue ou format incorrect) : ${(error as Error).message}`
		);
	}

	const documentFile = zip.file('word/document.xml');

	if (!documentFile) {
		throw new Error(
			'Le fichier DOCX ne contient pas de document.xml. ' +
				'Vérifiez que le fichier est un document Word valide.'
		);
	}

	return { zip, xml: documentFile.asText() };
}
