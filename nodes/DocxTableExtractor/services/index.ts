/**
 * ============================================================================
 * SERVICES DOCX TABLE EXTRACTOR - INDEX
 * ============================================================================
 *
 * Point d'entrée pour tous les services du DocxTableExtractor.
 *
 * PIPELINE :
 * - docx-table-reader.service.ts : lecture des tableaux du DOCX
 * - table-extractor.service.ts : construction et traitement d'un tableau
 * - header-detector.service.ts : détection de la ligne d'en-tête
 * - merge-handler.service.ts : détection des cellules fusionnées
 * - cell-classifier.service.ts : typage du contenu des cellules
 * - table-renderer.service.ts : rendu texte, CSV, Markdown, HTML, JSON
 * - node-config.service.ts : paramètres du nœud vers configuration
 */

export * from './cell-classifier.service';
export * from './docx-table-reader.service';
export * from './header-detector.service';
export * from './merge-handler.service';
export * from './node-config.service';
export * from './table-extractor.service';
export * from './table-renderer.service';
