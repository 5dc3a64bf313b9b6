/**
 * Custody Gateway
 *
 * Forwards accepted deposits to the fixed custodial destination. The sale
 * service calls it once per deposit, for the full deposited amount, after
 * the ledger has been updated.
 */

import {
  Connection,
  Keypair,
  PublicKey,
  SystemProgram,
  Transaction,
  sendAndConfirmTransaction,
} from '@solana/web3.js';

import type { Amount, Identity } from './types';

// ============ Types ============

export interface TransferReceipt {
  destination: Identity;
  amount: Amount;
  /** Transaction signature or other proof of transfer */
  reference: string;
}

export interface CustodyGateway {
  readonly destination: Identity;
  transfer(amount: Amount, participant: Identity): Promise<TransferReceipt>;
}

export interface SolanaCustodyOptions {
  rpcUrl: string;
  destination: string;
  /** Escrow account that holds deposits until they are forwarded */
  escrow: Keypair;
}

// ============ Solana ============

export class SolanaCustodyGateway implements CustodyGateway {
  readonly destination: Identity;
  private readonly destinationKey: PublicKey;
  private readonly connection: Connection;
  private readonly escrow: Keypair;

  constructor(options: SolanaCustodyOptions) {
    this.destinationKey = new PublicKey(options.destination);
    this.destination = this.destinationKey.toBase58();
    this.connection = new Connection(options.rpcUrl, 'confirmed');
    this.escrow = options.escrow;
  }

  async transfer(amount: Amount, participant: Identity): Promise<TransferReceipt> {
    const transaction = new Transaction().add(
      SystemProgram.transfer({
        fromPubkey: this.escrow.publicKey,
        toPubkey: this.destinationKey,
        lamports: amount,
      })
    );

    const signature = await sendAndConfirmTransaction(this.connection, transaction, [this.escrow]);
    return { destination: this.destination, amount, reference: `${participant}:${signature}` };
  }
}
