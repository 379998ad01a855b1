import bcrypt from 'bcrypt';

/**
 * Hashes and checks account PINs. Plain PINs are never stored.
 */
export interface CredentialHasher {
    hash(secret: string): Promise<string>;
    verify(secret: string, hash: string): Promise<boolean>;
}

export function createBcryptHasher(rounds: number): CredentialHasher {
    return {
        hash: (secret) => bcrypt.hash(secret, rounds),
        verify: (secret, hash) => bcrypt.compare(secret, hash),
    };
}
