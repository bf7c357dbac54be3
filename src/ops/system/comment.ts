import { BaseOperation } from '../../registry/operation';
import type { SignatureRegistry } from '../../registry/signature';
import type { ExecutionContext } from '../../runtime/execution-context';

export class CommentOp extends BaseOperation {
  static readonly library = 'core';
  static readonly operator = 'comment';
  static readonly label = 'Comment';

  static build(): CommentOp {
    return new CommentOp();
  }

  setup(_ctx: ExecutionContext, reg: SignatureRegistry): void {
    reg.addConfig('string', 'text')
      .meta({ kind: 'string', stringKind: 'plain', multiLine: true })
      .onNodeBody();
  }

  execute(): void { }
}
