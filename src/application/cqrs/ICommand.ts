/**
 * @fileoverview Command Interface - CQRS Write Side
 *
 * @packageDocumentation
 * @module @eventframe/core/application/cqrs
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * A command expresses an intent to change state (`CreateOrder`,
 * `ShipOrder`). It is routed by its `commandType` tag to exactly one
 * handler registered on the {@link CommandBus}.
 *
 * Commands that implement `validate()` are checked by the validation
 * middleware before the handler runs.
 *
 * @example
 * ```typescript
 * class CreateOrder extends CommandBase {
 *   readonly commandType = 'CreateOrder';
 *
 *   constructor(readonly orderId: string, readonly total: number) {
 *     super();
 *   }
 *
 *   validate(): Error | undefined {
 *     if (this.total <= 0) {
 *       return new ValidationError('total', 'must be positive', this.total);
 *     }
 *     return undefined;
 *   }
 * }
 * ```
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Metadata stamped on every command built from {@link CommandBase}.
 */
export interface CommandMetadata {
  commandId: string;
  timestamp: Date;
  correlationId?: string;
}

/**
 * ICommand - anything carrying a command type tag.
 */
export interface ICommand {
  /** Routing key on the command bus. */
  readonly commandType: string;
}

/**
 * Base class stamping an id and timestamp on each command.
 */
export abstract class CommandBase implements ICommand {
  abstract readonly commandType: string;

  readonly metadata: CommandMetadata;

  protected constructor(correlationId?: string) {
    this.metadata = {
      commandId: uuidv4(),
      timestamp: new Date(),
      correlationId,
    };
  }
}
