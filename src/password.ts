import prompts from 'prompts';

/** Supplies a keystore password each time one is needed; nothing is cached. */
export type PasswordProvider = () => Promise<string>;

async function promptHidden(message: string): Promise<string> {
  // `invisible` prompts echo nothing, not even a mask character
  const answer = await prompts({ type: 'invisible', name: 'password', message }, { onCancel: () => true });
  const value: unknown = answer.password;
  if (typeof value !== 'string') throw new Error('Password entry aborted');
  return value;
}

export function promptPassword(message = 'Enter keystore password'): PasswordProvider {
  return () => promptHidden(message);
}

/** Prompts twice and rejects a mismatch, for creating new keystores. */
export async function promptNewPassword(message = 'Enter password'): Promise<string> {
  const first = await promptHidden(message);
  const second = await promptHidden('Confirm password');
  if (first !== second) throw new Error('Passwords do not match');
  return first;
}

export function staticPassword(password: string): PasswordProvider {
  return async () => password;
}

export async function promptSecret(message: string): Promise<string> {
  return promptHidden(message);
}
