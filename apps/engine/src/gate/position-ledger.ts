/**
 * Position Ledger
 *
 * Engine-lifetime record of approved positions, shared by every cycle's BankrollContext.
 * An approval stays in flight (its stake counted as exposure) until the history store has
 * recorded the bet or the execution collaborator has refused it. Positions are dropped only
 * on refusal: an approval whose outcome is unknown keeps blocking duplicates.
 * Owns the lock that serializes the Gate's check-and-reserve across overlapping cycles.
 */

import { SerialLock } from '../../lib/serial-lock';

export interface Reservation {
  key: string;
  amount: number;
}

export class PositionLedger {
  private lock = new SerialLock();
  private positions: Set<string> = new Set();
  private inFlight: Map<string, Reservation> = new Map();

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    return this.lock.runExclusive(task);
  }

  hasPosition(key: string): boolean {
    return this.positions.has(key);
  }

  get inFlightExposure(): number {
    let total = 0;
    for (const reservation of this.inFlight.values()) {
      total += reservation.amount;
    }
    return total;
  }

  /**
   * Call inside runExclusive, after the Gate's checks pass
   */
  reserve(key: string, amount: number): Reservation {
    const reservation: Reservation = { key, amount };
    this.positions.add(key);
    this.inFlight.set(key, reservation);
    return reservation;
  }

  /**
   * The bet is in the history store: no longer in flight, the position stays
   */
  confirm(reservation: Reservation): boolean {
    if (this.inFlight.get(reservation.key) !== reservation) return false;
    this.inFlight.delete(reservation.key);
    return true;
  }

  /**
   * The execution collaborator refused the intent: exposure and position are freed
   */
  release(reservation: Reservation): boolean {
    if (this.inFlight.get(reservation.key) !== reservation) return false;
    this.inFlight.delete(reservation.key);
    this.positions.delete(reservation.key);
    return true;
  }
}
