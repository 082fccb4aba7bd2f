/**
 * Instruction Registry
 *
 * Maps operation selectors to their handlers. Acts as the dispatcher
 * for the program entry point.
 */

import { Operation } from '@bytecalc/types'
import {
  AddInstruction,
  DivideInstruction,
  ModuloInstruction,
  MultiplyInstruction,
  PowerInstruction,
  SubtractInstruction,
} from './arithmetic'
import type { CalculatorInstructionHandler } from './base'

/**
 * One handler per operation; a missing member of Operation fails to compile
 */
const OPERATION_HANDLERS: Record<Operation, () => CalculatorInstructionHandler> =
  {
    [Operation.Add]: () => new AddInstruction(),
    [Operation.Subtract]: () => new SubtractInstruction(),
    [Operation.Multiply]: () => new MultiplyInstruction(),
    [Operation.Divide]: () => new DivideInstruction(),
    [Operation.Modulo]: () => new ModuloInstruction(),
    [Operation.Power]: () => new PowerInstruction(),
  }

export class InstructionRegistry {
  private handlers: Map<number, CalculatorInstructionHandler> = new Map()

  constructor() {
    this.registerInstructions()
  }

  /**
   * Register all operation handlers
   */
  private registerInstructions(): void {
    for (const create of Object.values(OPERATION_HANDLERS)) {
      this.register(create())
    }
  }

  /**
   * Register an instruction handler
   */
  register(handler: CalculatorInstructionHandler): void {
    this.handlers.set(handler.opcode, handler)
  }

  /**
   * Get instruction handler by selector
   */
  getHandler(selector: number): CalculatorInstructionHandler | undefined {
    return this.handlers.get(selector)
  }
}
