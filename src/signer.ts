/**
 * Detached PKCS#7 signatures over PKCS#12 key material, built on node-forge
 */
import * as forge from 'node-forge';
import { KeyPairError, SignerError, errorMessage } from './errors';
import type { Signer } from './types';

/**
 * A private key with its certificate chain, leaf first
 */
export interface KeyPair {
  key: forge.pki.rsa.PrivateKey;
  certificates: forge.pki.Certificate[];
}

// anyExtendedKeyUsage has no name in forge's OID registry
const OID_ANY_EXTENDED_KEY_USAGE = '2.5.29.37.0';

function isRSAKey(key: forge.pki.PublicKey | forge.pki.PrivateKey): key is forge.pki.rsa.PublicKey {
  return 'n' in key && 'e' in key;
}

function isRSAPrivateKey(key: forge.pki.PrivateKey): key is forge.pki.rsa.PrivateKey {
  return 'n' in key && 'd' in key;
}

function matchesKey(certificate: forge.pki.Certificate, key: forge.pki.rsa.PrivateKey): boolean {
  const publicKey = certificate.publicKey;
  return isRSAKey(publicKey) && publicKey.n.equals(key.n) && publicKey.e.equals(key.e);
}

/**
 * Parses and verifies PKCS#12 data
 * @param p12 DER-encoded PKCS#12 bundle
 * @param password Bundle password, may be empty
 */
export function parsePKCS12(p12: Buffer, password: string): KeyPair {
  let bundle: forge.pkcs12.Pkcs12Pfx;
  try {
    const asn1 = forge.asn1.fromDer(forge.util.createBuffer(p12.toString('binary')));
    bundle = forge.pkcs12.pkcs12FromAsn1(asn1, password);
  } catch (err) {
    throw new KeyPairError(errorMessage(err));
  }

  const keyBagTypes = [forge.pki.oids.pkcs8ShroudedKeyBag, forge.pki.oids.keyBag];
  const keys: forge.pki.PrivateKey[] = [];
  for (const bagType of keyBagTypes) {
    for (const bag of bundle.getBags({ bagType })[bagType] ?? []) {
      if (bag.key) keys.push(bag.key);
    }
  }

  const certBagType = forge.pki.oids.certBag;
  const certificates: forge.pki.Certificate[] = [];
  for (const bag of bundle.getBags({ bagType: certBagType })[certBagType] ?? []) {
    if (bag.cert) certificates.push(bag.cert);
  }

  if (keys.length === 0) {
    throw new KeyPairError('missing private key');
  }
  if (keys.length > 1) {
    throw new KeyPairError('more than one private key');
  }
  if (certificates.length === 0) {
    throw new KeyPairError('missing certificate');
  }

  const key = keys[0];
  if (!isRSAPrivateKey(key)) {
    throw new KeyPairError('unknown public key algorithm');
  }

  // The leaf is the certificate belonging to the key, the rest is its chain
  const leafIndex = certificates.findIndex(certificate => matchesKey(certificate, key));
  if (leafIndex < 0) {
    if (!certificates.some(certificate => isRSAKey(certificate.publicKey))) {
      throw new KeyPairError('private key type does not match public key type');
    }
    throw new KeyPairError('private key does not match public key');
  }

  const [leaf] = certificates.splice(leafIndex, 1);
  return { key, certificates: [leaf, ...certificates] };
}

function hasFlag(extension: {} | undefined, flag: string): boolean {
  return extension !== undefined && Object.getOwnPropertyDescriptor(extension, flag)?.value === true;
}

/**
 * Refuses certificates that can't make useful document signatures
 */
export function checkKeyUsage(certificate: forge.pki.Certificate): void {
  const keyUsage = certificate.getExtension('keyUsage');
  if (!hasFlag(keyUsage, 'digitalSignature') && !hasFlag(keyUsage, 'nonRepudiation')) {
    throw new SignerError("key/cert: the certificate's key usage must include digital signatures or non-repudiation");
  }

  const extKeyUsage = certificate.getExtension('extKeyUsage');
  if (extKeyUsage !== undefined &&
      !hasFlag(extKeyUsage, 'emailProtection') &&
      !hasFlag(extKeyUsage, OID_ANY_EXTENDED_KEY_USAGE)) {
    throw new SignerError("key/cert: the certificate's extended key usage must include S/MIME");
  }
}

/**
 * Produces detached CMS SignedData with a SHA-256 digest
 */
export class PKCS7Signer implements Signer {
  private readonly keyPair: KeyPair;
  private readonly signingTime?: Date;

  /**
   * @param signingTime Value of the signingTime attribute (default: now)
   */
  constructor(keyPair: KeyPair, signingTime?: Date) {
    if (keyPair.certificates.length === 0) {
      throw new KeyPairError('missing certificate');
    }
    this.keyPair = keyPair;
    this.signingTime = signingTime;
  }

  sign(content: Buffer): Buffer {
    const [leaf, ...chain] = this.keyPair.certificates;
    checkKeyUsage(leaf);

    try {
      const p7 = forge.pkcs7.createSignedData();
      p7.content = forge.util.createBuffer(content.toString('binary'));
      p7.addCertificate(leaf);
      for (const certificate of chain) {
        p7.addCertificate(certificate);
      }

      p7.addSigner({
        key: this.keyPair.key,
        certificate: leaf,
        digestAlgorithm: forge.pki.oids.sha256,
        authenticatedAttributes: [
          { type: forge.pki.oids.contentType, value: forge.pki.oids.data },
          { type: forge.pki.oids.messageDigest },
          { type: forge.pki.oids.signingTime, value: (this.signingTime ?? new Date()).toISOString() }
        ]
      });
      p7.sign({ detached: true });

      return Buffer.from(forge.asn1.toDer(p7.toAsn1()).getBytes(), 'binary');
    } catch (err) {
      throw new SignerError(`key/cert: ${errorMessage(err)}`);
    }
  }
}
