export { loadTemplateFile, loadAdTemplates, loadOptionalTemplate } from './templates';
export type { TemplateLoaderConfig, TemplateSet } from './types';
