/**
 * Anti-forgery values for one login attempt, held server-side
 */
export interface LoginAttempt {
  state: string;
  nonce: string;
  createdAt: number; // epoch ms
}
