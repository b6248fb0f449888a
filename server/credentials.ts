import crypto from "crypto";

const IV_LENGTH = 12;

export interface CredentialCipher {
  encrypt(plain: string): string;
  /** Returns null when the token is malformed or was sealed with another key. */
  decrypt(token: string): string | null;
}

function deriveKey(secret: string): Buffer {
  return crypto.createHash("sha256").update(secret).digest();
}

/**
 * AES-256-GCM cipher for the reversible copy of a client's portal password.
 * Tokens are `iv.tag.ciphertext`, each part base64url.
 */
export function createCredentialCipher(secret: string): CredentialCipher {
  const key = deriveKey(secret);

  return {
    encrypt(plain: string): string {
      const iv = crypto.randomBytes(IV_LENGTH);
      const cipher = crypto.createCipheriv("aes-256-gcm", key, iv);
      const ciphertext = Buffer.concat([cipher.update(plain, "utf8"), cipher.final()]);
      const tag = cipher.getAuthTag();
      return [iv, tag, ciphertext].map((part) => part.toString("base64url")).join(".");
    },

    decrypt(token: string): string | null {
      const parts = token.split(".");
      if (parts.length !== 3) {
        return null;
      }

      try {
        const [iv, tag, ciphertext] = parts.map((part) => Buffer.from(part, "base64url"));
        const decipher = crypto.createDecipheriv("aes-256-gcm", key, iv);
        decipher.setAuthTag(tag);
        return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
      } catch (error) {
        console.error("[CREDENTIALS] Failed to decrypt stored password:", error instanceof Error ? error.message : error);
        return null;
      }
    },
  };
}

/**
 * Cipher used when no CREDENTIALS_SECRET is set: nothing can be sealed or opened.
 */
export const unavailableCredentialCipher: CredentialCipher = {
  encrypt(): string {
    throw new Error("CREDENTIALS_SECRET is not configured");
  },
  decrypt(): string | null {
    return null;
  },
};
