/**
 * ============================================================================
 * UTILITAIRES PARTAGÉS - INDEX
 * ============================================================================
 */

export * from './docx.utils';
export * from './style-detector.utils';
export * from './table-config.utils';
export * from './table-model.utils';
export * from './text.utils';
export * from './xml.utils';
