import type { RegistrationKind } from '../errors';
import type { Template } from '../template';
import { Registry } from './registry';

/**
 * Parsed templates available to `prompty.include`
 */
export class TemplateRegistry extends Registry<Template> {
  protected readonly kind: RegistrationKind = 'template';

  register(name: string, template: Template): void {
    this.add(name, template);
  }
}
