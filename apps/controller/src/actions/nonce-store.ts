/**
 * In-memory replay guard for signed actions.
 * Maps signer pubkey → highest accepted nonce.
 *
 * Flow:
 *   1. Client signs ActionV1 with nonce = last + 1 (gaps allowed)
 *   2. POST /action → signature verified, body validated
 *   3. claim(from, nonce): rejects anything ≤ the last accepted nonce
 *   4. Action dispatched; the nonce stays spent even if the action fails
 *
 * In-memory: a restart forgets nonces, as it forgets every other piece of
 * controller state.
 */

export class NonceStore {
  private readonly lastNonce = new Map<string, number>();

  last(signer: string): number {
    return this.lastNonce.get(signer) ?? 0;
  }

  /** Accept `nonce` for `signer` if it is fresh. Returns false on replay. */
  claim(signer: string, nonce: number): boolean {
    if (nonce <= this.last(signer)) return false;
    this.lastNonce.set(signer, nonce);
    return true;
  }
}
