export { Registry } from './registry';
export { ResolverRegistry } from './resolver-registry';
export { TemplateRegistry } from './template-registry';
