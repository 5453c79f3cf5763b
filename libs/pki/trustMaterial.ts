/**
 * Trust Material
 *
 * Immutable holders for the two halves of mTLS configuration:
 * - KeyBundle: private key + leaf certificate (+ chain), from a
 *   password-protected PKCS#12 archive.
 * - TrustList: the set of issuer certificates a peer is validated against.
 *
 * Loading is all-or-nothing. Corrupt bytes, a wrong passphrase or a key that
 * does not belong to the certificate are ConfigurationErrors; no partially
 * populated object is ever returned.
 *
 * PKCS#12 decoding goes through node-forge, which reads RSA keys only.
 */

import forge from 'node-forge';
import crypto from 'crypto';
import fs from 'fs';
import tls from 'tls';
import { ConfigurationError } from '../errors/ConfigurationError.js';
import { logger } from '../logging/logger.js';

const log = logger.child({ component: 'TrustMaterial' });

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/** Resolves a material reference (a file path by default) to its bytes. */
export type MaterialReader = (ref: string) => Buffer;

export const readMaterialFile: MaterialReader = (ref) => fs.readFileSync(ref);

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function invalid(ref: string, message: string, cause?: unknown): ConfigurationError {
    return new ConfigurationError('CONFIG_INVALID_MATERIAL', ref, `${message} (${ref})`, { cause });
}

function decodePkcs12(bytes: Buffer, passphrase: string, ref: string): forge.pkcs12.Pkcs12Pfx {
    try {
        const der = forge.util.createBuffer(bytes.toString('binary'));
        return forge.pkcs12.pkcs12FromAsn1(forge.asn1.fromDer(der), false, passphrase);
    } catch (err) {
        throw invalid(ref, `Unreadable PKCS#12 archive: ${describe(err)}`, err);
    }
}

/**
 * A DER certificate and a PKCS#12 archive both open with an ASN.1 SEQUENCE;
 * only the certificate's first inner element is itself a SEQUENCE (TBSCertificate),
 * where PKCS#12 starts with an INTEGER version.
 */
function isDerCertificate(bytes: Buffer): boolean {
    try {
        const root = forge.asn1.fromDer(forge.util.createBuffer(bytes.toString('binary')));
        const first = Array.isArray(root.value) ? root.value[0] : undefined;
        return first !== undefined && first.type === forge.asn1.Type.SEQUENCE;
    } catch (err) {
        log.debug({ error: describe(err) }, 'Trust bytes are not DER encoded');
        return false;
    }
}

function bagsOf(p12: forge.pkcs12.Pkcs12Pfx, bagType: string): forge.pkcs12.Bag[] {
    return p12.getBags({ bagType })[bagType] ?? [];
}

function certificatesOf(p12: forge.pkcs12.Pkcs12Pfx): string[] {
    return bagsOf(p12, forge.pki.oids.certBag)
        .flatMap(bag => (bag.cert ? [forge.pki.certificateToPem(bag.cert)] : []));
}

/**
 * "CN=Bob, O=Kingdom" style rendering of a certificate subject.
 */
export function formatDistinguishedName(x509: crypto.X509Certificate): string {
    return x509.subject.split('\n').filter(Boolean).join(', ');
}

export class KeyBundle {
    readonly subject: string;
    readonly commonName: string | undefined;
    readonly fingerprint: string;
    readonly validTo: Date;
    /** Leaf first, then any intermediates, PEM encoded. */
    readonly certificateChain: string;
    private readonly privateKey: string;

    private constructor(privateKey: string, leaf: crypto.X509Certificate, chain: string[]) {
        this.privateKey = privateKey;
        this.subject = formatDistinguishedName(leaf);
        this.commonName = /(?:^|, )CN=([^,]*)/.exec(this.subject)?.[1];
        this.fingerprint = leaf.fingerprint256;
        this.validTo = new Date(leaf.validTo);
        this.certificateChain = chain.join('\n');
        Object.freeze(this);
    }

    static fromPkcs12(bytes: Buffer, passphrase: string, ref = 'key bundle'): KeyBundle {
        const p12 = decodePkcs12(bytes, passphrase, ref);

        const keyBag = [
            ...bagsOf(p12, forge.pki.oids.pkcs8ShroudedKeyBag),
            ...bagsOf(p12, forge.pki.oids.keyBag),
        ].find(bag => bag.key);
        if (!keyBag?.key) {
            throw invalid(ref, 'PKCS#12 archive holds no readable private key');
        }

        let privateKey: crypto.KeyObject;
        let keyPem: string;
        try {
            keyPem = forge.pki.privateKeyToPem(keyBag.key);
            privateKey = crypto.createPrivateKey(keyPem);
        } catch (err) {
            throw invalid(ref, `Private key could not be decoded: ${describe(err)}`, err);
        }

        let certificates: { pem: string; x509: crypto.X509Certificate }[];
        try {
            certificates = certificatesOf(p12).map(pem => ({ pem, x509: new crypto.X509Certificate(pem) }));
        } catch (err) {
            throw invalid(ref, `Certificate could not be decoded: ${describe(err)}`, err);
        }
        const leaf = certificates.find(c => c.x509.checkPrivateKey(privateKey));
        if (!leaf) {
            throw invalid(ref, 'PKCS#12 archive holds no certificate matching its private key');
        }

        const chain = [leaf.pem, ...certificates.filter(c => c !== leaf).map(c => c.pem)];
        try {
            tls.createSecureContext({ key: keyPem, cert: chain.join('\n') });
        } catch (err) {
            throw invalid(ref, `TLS stack rejected key material: ${describe(err)}`, err);
        }

        const bundle = new KeyBundle(keyPem, leaf.x509, chain);
        if (bundle.validTo.getTime() <= Date.now()) {
            log.warn({ ref, subject: bundle.subject, validTo: bundle.validTo.toISOString() }, 'Loaded certificate has expired');
        }
        return bundle;
    }

    /**
     * Key and chain in the shape node's TLS options take.
     * Only the transport factory reads this.
     */
    tlsIdentity(): { key: string; cert: string } {
        return { key: this.privateKey, cert: this.certificateChain };
    }

    toJSON(): Record<string, string> {
        return { subject: this.subject, fingerprint: this.fingerprint, validTo: this.validTo.toISOString() };
    }
}

export class TrustList {
    readonly certificates: readonly string[];
    readonly subjects: readonly string[];

    private constructor(certificates: string[]) {
        this.certificates = Object.freeze([...certificates]);
        this.subjects = Object.freeze(certificates.map(pem => formatDistinguishedName(new crypto.X509Certificate(pem))));
        Object.freeze(this);
    }

    /**
     * Accepts a PEM bundle, a single DER certificate, or a PKCS#12 trust store.
     */
    static fromBytes(bytes: Buffer, ref = 'trust list', passphrase?: string): TrustList {
        const text = bytes.toString('utf8');
        const pems = text.match(PEM_CERTIFICATE);

        let certificates: string[];
        if (pems) {
            certificates = pems;
        } else {
            certificates = isDerCertificate(bytes)
                ? [derToPem(bytes, ref)]
                : certificatesOf(decodePkcs12(bytes, passphrase ?? '', ref));
        }

        if (certificates.length === 0) {
            throw invalid(ref, 'Trust list holds no certificates');
        }

        for (const pem of certificates) {
            let x509: crypto.X509Certificate;
            try {
                x509 = new crypto.X509Certificate(pem);
            } catch (err) {
                throw invalid(ref, `Trust list entry is not a certificate: ${describe(err)}`, err);
            }
            if (!x509.ca) {
                log.warn({ ref, subject: formatDistinguishedName(x509) }, 'Trusted certificate is not a CA certificate');
            }
        }

        return new TrustList(certificates);
    }

    get pem(): string {
        return this.certificates.join('\n');
    }

    toJSON(): Record<string, readonly string[]> {
        return { subjects: this.subjects };
    }
}

function derToPem(bytes: Buffer, ref: string): string {
    try {
        return new crypto.X509Certificate(bytes).toString();
    } catch (err) {
        throw invalid(ref, `DER trust entry is not a certificate: ${describe(err)}`, err);
    }
}

export function loadKeyBundle(ref: string, passphrase: string, read: MaterialReader = readMaterialFile): KeyBundle {
    return KeyBundle.fromPkcs12(readRef(ref, read), passphrase, ref);
}

export function loadTrustList(ref: string, passphrase?: string, read: MaterialReader = readMaterialFile): TrustList {
    return TrustList.fromBytes(readRef(ref, read), ref, passphrase);
}

function readRef(ref: string, read: MaterialReader): Buffer {
    try {
        return read(ref);
    } catch (err) {
        throw invalid(ref, `Material could not be read: ${describe(err)}`, err);
    }
}
