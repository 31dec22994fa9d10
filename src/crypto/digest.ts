import _sodium from 'libsodium-wrappers';

/**
 * BLAKE2b-256 of a file's bytes, printed on both ends of a transfer so the
 * two sides can be compared by eye. Not an authentication mechanism.
 */
export const fileDigest = async (data: Uint8Array): Promise<string> => {
    await _sodium.ready;
    const sodium = _sodium;
    return sodium.to_hex(sodium.crypto_generichash(32, data));
};

export const shortDigest = (digest: string): string => digest.slice(0, 16);
