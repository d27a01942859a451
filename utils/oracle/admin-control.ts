import { ZeroAddress } from "ethers";

import { isZeroAddress, toChecksumAddress } from "../address";
import {
  AdminCantBeZeroError,
  MsgSenderNotAdminError,
  PendingAdminAlreadySetError,
} from "./errors";

export interface PendingAdminChange {
  readonly oldPendingAdmin: string;
  readonly newPendingAdmin: string;
}

export interface AdminChange {
  readonly oldAdmin: string;
  readonly newAdmin: string;
}

/**
 * Two-step admin transfer
 *
 * The admin proposes a pending admin, then finalizes it. Every check is a
 * function of this state and the caller passed in; there is no ambient
 * "current sender".
 */
export class AdminControl {
  private currentAdmin: string;
  private currentPendingAdmin: string = ZeroAddress;

  constructor(admin: string) {
    this.currentAdmin = toChecksumAddress(admin);
  }

  get admin(): string {
    return this.currentAdmin;
  }

  // ZeroAddress when there is none
  get pendingAdmin(): string {
    return this.currentPendingAdmin;
  }

  isAdmin(caller: string): boolean {
    return toChecksumAddress(caller) === this.currentAdmin;
  }

  assertAdmin(caller: string): void {
    if (!this.isAdmin(caller)) {
      throw new MsgSenderNotAdminError(caller);
    }
  }

  /**
   * Propose a new admin, or ZeroAddress to withdraw the proposal
   *
   * @param caller - Must be the admin
   * @param candidate - The proposed admin
   * @returns The old and new pending admins
   */
  setPendingAdmin(caller: string, candidate: string): PendingAdminChange {
    this.assertAdmin(caller);
    const newPendingAdmin = toChecksumAddress(candidate);

    if (newPendingAdmin === this.currentPendingAdmin) {
      throw new PendingAdminAlreadySetError(newPendingAdmin);
    }

    const oldPendingAdmin = this.currentPendingAdmin;
    this.currentPendingAdmin = newPendingAdmin;
    return { oldPendingAdmin, newPendingAdmin };
  }

  /**
   * Make the pending admin the admin and clear the pending slot
   *
   * @param caller - Must be the admin
   * @returns The old and new admins
   */
  acceptAdmin(caller: string): AdminChange {
    this.assertAdmin(caller);

    if (isZeroAddress(this.currentPendingAdmin)) {
      throw new AdminCantBeZeroError();
    }

    const oldAdmin = this.currentAdmin;
    this.currentAdmin = this.currentPendingAdmin;
    this.currentPendingAdmin = ZeroAddress;
    return { oldAdmin, newAdmin: this.currentAdmin };
  }
}
