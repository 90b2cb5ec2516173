export { toGray, findTemplate, hitCenter } from './template-match';
export { createInlineSearch, createWorkerSearch } from './search';
export type { TemplateHit, TemplateSearch } from './types';
