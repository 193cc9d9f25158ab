export { PdfNodes } from './PdfNode';
export type { PdfNode, PdfNodeKind } from './PdfNode';
export { resolveAnnotations, resolveNode, flattenResolved, decodePdfBytes } from './resolveAnnotations';
export type { AnnotationResolution, ResolvedNode } from './resolveAnnotations';
