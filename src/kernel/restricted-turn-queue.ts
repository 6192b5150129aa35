import { kernelRuntimeError } from './runtime-error.js';
import { TurnQueue } from './turn-queue.js';
import type { Combatant } from './types.js';

const MAX_ELIGIBLE_SELF_TICKETS = 2;

/**
 * Turn queue where every ticket carries a permission bit deciding whether it
 * may enqueue further tickets.
 *
 * Rules, with the front ticket taken as the one adding:
 * - an actor holding no ticket is always accepted, and that ticket may add;
 * - an ineligible front ticket cannot add anything (the add is dropped);
 * - tickets an actor adds for someone else cannot add;
 * - an actor already holding two eligible tickets gets an ineligible one.
 *
 * ```
 * A -> A -> B      A adds A      A -> A -> B -> A
 * Y    Y    Y                    Y    Y    Y    N
 * ```
 */
export class RestrictedTurnQueue extends TurnQueue {
  private readonly permissions: boolean[] = [];

  override add(combatant: Combatant): void {
    this.assertAligned();
    this.bindPlayers(combatant);

    if (!this.tickets.includes(combatant)) {
      this.append(combatant, true);
      return;
    }

    const front = this.tickets[0];
    if (front === undefined || this.permissions[0] !== true) {
      return;
    }

    if (front === combatant) {
      this.append(combatant, this.getAddAbilityCount(combatant) < MAX_ELIGIBLE_SELF_TICKETS);
      return;
    }

    this.append(combatant, false);
  }

  override remove(): Combatant {
    this.assertAligned();
    return super.remove();
  }

  getAddAbilityCount(combatant: Combatant): number {
    let count = 0;
    this.tickets.forEach((ticket, index) => {
      if (ticket === combatant && this.permissions[index] === true) {
        count += 1;
      }
    });
    return count;
  }

  getPermissions(): readonly boolean[] {
    return [...this.permissions];
  }

  /** Permissions are recomputed by replaying every ticket through `add`. */
  override copy(): RestrictedTurnQueue {
    const clone = new RestrictedTurnQueue();
    this.replayInto(clone);
    return clone;
  }

  protected override dropFront(): void {
    super.dropFront();
    this.permissions.shift();
  }

  private append(combatant: Combatant, canAdd: boolean): void {
    this.tickets.push(combatant);
    this.permissions.push(canAdd);
  }

  private assertAligned(): void {
    if (this.permissions.length !== this.tickets.length) {
      throw kernelRuntimeError('PERMISSION_TABLE_MISALIGNED', 'Restricted turn queue permissions out of step with tickets', {
        ticketCount: this.tickets.length,
        permissionCount: this.permissions.length,
      });
    }
  }
}
