/**
 * ============================================================================
 * MODULE PARTAGÉ - INDEX PRINCIPAL
 * ============================================================================
 *
 * Ce module centralise l'export des types, erreurs et utilitaires partagés
 * par le moteur de tableaux et le nœud DocxTableExtractor.
 *
 * UTILISATION :
 * ```typescript
 * import { TableData, createDefaultConfig, loadDocxDocumentXml } from '../shared';
 * ```
 */

// Types partagés
export * from './types';

// Erreurs
export * from './errors';

// Utilitaires partagés
export * from './utils';
