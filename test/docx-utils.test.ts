import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import PizZip from 'pizzip';
import { loadDocxDocumentXml } from '../nodes/shared/utils/docx.utils';
import {
	extractAlignment,
	extractRunFormatting,
	extractShadingFill,
	isBold,
} from '../nodes/shared/utils/style-detector.utils';
import { normalizeMultilineText, normalizeText, truncate } from '../nodes/shared/utils/text.utils';
import {
	decodeXmlEntities,
	escapeXml,
	extractParagraphText,
	findTopLevelElements,
} from '../nodes/shared/utils/xml.utils';
import { createDocxFromBodyXml } from './helpers';

describe('xml.utils', () => {
	test('findTopLevelElements ignore les éléments imbriqués', () => {
		const xml =
			'<w:tc><w:tcPr/><w:p>A</w:p></w:tc>' +
			'<w:tc><w:tbl><w:tr><w:tc><w:p>B</w:p></w:tc></w:tr></w:tbl></w:tc>';

		assert.deepEqual(findTopLevelElements(xml, 'w:tc'), [
			'<w:tc><w:tcPr/><w:p>A</w:p></w:tc>',
			'<w:tc><w:tbl><w:tr><w:tc><w:p>B</w:p></w:tc></w:tr></w:tbl></w:tc>',
		]);
	});

	test('extractParagraphText rend tabulations et sauts de ligne', () => {
		const paragraph =
			'<w:p><w:r><w:t>Total</w:t><w:tab/><w:t xml:space="preserve">HT </w:t></w:r>' +
			'<w:r><w:br/><w:t>R&amp;D</w:t></w:r></w:p>';

		assert.equal(extractParagraphText(paragraph), 'Total HT \nR&D');
	});

	test('decodeXmlEntities décode les entités nommées et numériques', () => {
		assert.equal(decodeXmlEntities('R&amp;D &#233;&#xE9; &lt;&gt; &inconnu;'), 'R&D éé <> &inconnu;');
	});

	test('escapeXml échappe les caractères réservés', () => {
		assert.equal(escapeXml(`<a href="x">l'été & co</a>`), '&lt;a href=&quot;x&quot;&gt;l&apos;été &amp; co&lt;/a&gt;');
	});
});

describe('style-detector.utils', () => {
	test('extractRunFormatting lit les propriétés du run', () => {
		const run =
			'<w:r><w:rPr><w:rFonts w:ascii="Arial" w:hAnsi="Arial"/><w:b/><w:i w:val="1"/>' +
			'<w:u w:val="single"/><w:color w:val="ff0000"/><w:sz w:val="24"/></w:rPr><w:t>A</w:t></w:r>';

		assert.deepEqual(extractRunFormatting(run), {
			bold: true,
			italic: true,
			underline: true,
			fontSize: 12,
			fontFamily: 'Arial',
			textColor: '#FF0000',
		});
	});

	test('extractRunFormatting retourne un objet vide sans propriétés', () => {
		assert.deepEqual(extractRunFormatting('<w:r><w:t>A</w:t></w:r>'), {});
	});

	test('un gras désactivé n\'est pas du gras', () => {
		assert.equal(isBold('<w:b w:val="0"/>'), false);
		assert.equal(isBold('<w:b w:val="true"/>'), true);
	});

	test('extractShadingFill ignore le fond automatique', () => {
		assert.equal(extractShadingFill('<w:shd w:val="clear" w:color="auto" w:fill="d9e2f3"/>'), '#D9E2F3');
		assert.equal(extractShadingFill('<w:shd w:val="clear" w:color="auto" w:fill="auto"/>'), null);
	});

	test('extractAlignment normalise les valeurs Word', () => {
		assert.equal(extractAlignment('<w:jc w:val="both"/>'), 'justify');
		assert.equal(extractAlignment('<w:jc w:val="end"/>'), 'right');
		assert.equal(extractAlignment('<w:jc w:val="start"/>'), 'left');
		assert.equal(extractAlignment('<w:pPr/>'), null);
	});
});

describe('text.utils', () => {
	test('normalizeText retire les caractères spéciaux Word', () => {
		assert.equal(normalizeText('  Nom\u00A0 commercial\t '), 'Nom commercial');
		assert.equal(normalizeText('\uF0B7Point\u00A0clé'), 'Point clé');
	});

	test('normalizeMultilineText garde les lignes non vides', () => {
		assert.equal(normalizeMultilineText(' Ligne 1 \n\n Ligne 2 '), 'Ligne 1\nLigne 2');
	});

	test('truncate ajoute une ellipse au-delà de la longueur maximale', () => {
		assert.equal(truncate('abcdef', 3), 'abc...');
		assert.equal(truncate('abc', 3), 'abc');
	});
});

describe('loadDocxDocumentXml', () => {
	test('retourne le XML de word/document.xml', () => {
		const { xml } = loadDocxDocumentXml(createDocxFromBodyXml('<w:p/>'));
		assert.ok(xml.includes('<w:body><w:p/></w:body>'));
	});

	test('rejette un fichier qui n\'est pas une archive ZIP', () => {
		assert.throws(() => loadDocxDocumentXml(Buffer.from('pas un zip')), /n'est pas un document DOCX valide/);
	});

	test('rejette une archive sans document.xml', () => {
		const zip = new PizZip();
		zip.file('autre.txt', 'contenu');
		const buffer = zip.generate({ type: 'nodebuffer' });

		assert.throws(() => loadDocxDocumentXml(buffer), /ne contient pas de document\.xml/);
	});
});
