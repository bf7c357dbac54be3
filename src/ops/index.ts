import type { OperationFactory } from '../registry/operation';
import { ArithmeticOp } from './math/arithmetic';
import { ShadeOp } from './graphics/shade';
import { SolidOp } from './graphics/solid';
import { CommentOp } from './system/comment';
import { ImageOp } from './system/image';
import { InputOp } from './system/input';
import { OutputOp } from './system/output';
import { TimeOp } from './system/time';

export { ArithmeticOp, CommentOp, ImageOp, InputOp, OutputOp, ShadeOp, SolidOp, TimeOp };

export const BUILTIN_OPERATIONS: readonly OperationFactory[] = [
  InputOp,
  OutputOp,
  CommentOp,
  TimeOp,
  ImageOp,
  ArithmeticOp,
  SolidOp,
  ShadeOp,
];
