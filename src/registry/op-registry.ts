import { DuplicateOperationTypeError, UnknownOperationTypeError } from '../errors';
import type { OpPath, Operation, OperationFactory } from './operation';

export interface OperatorEntry extends OpPath {
  label: string;
}

/**
 * `library -> operator -> factory` table backing the add-node menu and construction by name.
 */
export class OperationRegistry {
  private readonly libraries = new Map<string, Map<string, OperationFactory>>();

  register(factory: OperationFactory): void {
    let operators = this.libraries.get(factory.library);
    if (!operators) {
      operators = new Map();
      this.libraries.set(factory.library, operators);
    }
    if (operators.has(factory.operator)) {
      throw new DuplicateOperationTypeError(factory.library, factory.operator);
    }
    operators.set(factory.operator, factory);
  }

  has(path: OpPath): boolean {
    return this.factory(path) !== undefined;
  }

  factory(path: OpPath): OperationFactory | undefined {
    return this.libraries.get(path.library)?.get(path.operator);
  }

  build(path: OpPath): Operation {
    const factory = this.factory(path);
    if (!factory) throw new UnknownOperationTypeError(path.library, path.operator);
    return factory.build();
  }

  label(path: OpPath): string | undefined {
    return this.factory(path)?.label;
  }

  categories(): string[] {
    return [...this.libraries.keys()].sort();
  }

  iterCategory(library: string): OperatorEntry[] {
    const operators = this.libraries.get(library);
    if (!operators) return [];
    return [...operators.values()]
      .map(f => ({ library: f.library, operator: f.operator, label: f.label }))
      .sort((a, b) => a.operator.localeCompare(b.operator));
  }
}
