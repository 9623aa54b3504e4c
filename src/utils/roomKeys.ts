import nacl from 'tweetnacl'
import naclUtil from 'tweetnacl-util'

import type { RoomKey } from '@/types/backend'
import { DecryptionFailedError } from '@/utils/errors'

export const SECRETBOX_ALGORITHM = 'io.unichat.secretbox.v1'

/**
 * A symmetric room-key cipher. Ciphertext and key material are base64
 * strings so they can travel inside JSON event content.
 */
export interface RoomKeyCipher {
  readonly algorithm: string
  generateKey(roomId: string): RoomKey
  encrypt(key: RoomKey, plaintext: string): string
  decrypt(key: RoomKey, ciphertext: string): string
}

const decodeKey = (key: RoomKey) => {
  try {
    const bytes = naclUtil.decodeBase64(key.sessionKey)
    if (bytes.length !== nacl.secretbox.keyLength) {
      throw new DecryptionFailedError('bad_ciphertext', 'Room key has the wrong length')
    }
    return bytes
  } catch (err) {
    if (err instanceof DecryptionFailedError) {
      throw err
    }
    throw new DecryptionFailedError('bad_ciphertext', 'Room key is not valid base64')
  }
}

export const secretboxCipher: RoomKeyCipher = {
  algorithm: SECRETBOX_ALGORITHM,

  generateKey(roomId) {
    return {
      algorithm: SECRETBOX_ALGORITHM,
      roomId,
      sessionId: naclUtil.encodeBase64(nacl.randomBytes(16)),
      sessionKey: naclUtil.encodeBase64(nacl.randomBytes(nacl.secretbox.keyLength)),
    }
  },

  encrypt(key, plaintext) {
    const nonce = nacl.randomBytes(nacl.secretbox.nonceLength)
    const boxed = nacl.secretbox(naclUtil.decodeUTF8(plaintext), nonce, decodeKey(key))

    // nonce || box
    const combined = new Uint8Array(nonce.length + boxed.length)
    combined.set(nonce)
    combined.set(boxed, nonce.length)
    return naclUtil.encodeBase64(combined)
  },

  decrypt(key, ciphertext) {
    let combined: Uint8Array
    try {
      combined = naclUtil.decodeBase64(ciphertext)
    } catch {
      throw new DecryptionFailedError('bad_ciphertext', 'Ciphertext is not valid base64')
    }
    if (combined.length <= nacl.secretbox.nonceLength) {
      throw new DecryptionFailedError('bad_ciphertext', 'Ciphertext is truncated')
    }

    const nonce = combined.slice(0, nacl.secretbox.nonceLength)
    const boxed = combined.slice(nacl.secretbox.nonceLength)
    const opened = nacl.secretbox.open(boxed, nonce, decodeKey(key))
    if (!opened) {
      throw new DecryptionFailedError('bad_ciphertext', 'Ciphertext failed authentication')
    }
    return naclUtil.encodeUTF8(opened)
  },
}

const ciphers = new Map<string, RoomKeyCipher>([[secretboxCipher.algorithm, secretboxCipher]])

export const registerCipher = (cipher: RoomKeyCipher) => {
  ciphers.set(cipher.algorithm, cipher)
}

export const getCipher = (algorithm: string): RoomKeyCipher | null => ciphers.get(algorithm) ?? null
