/**
 * In-process test PKI: authorities, leaf certificates and PKCS#12 archives
 * generated per test run. Nothing is written to disk.
 */

import forge from 'node-forge';
import crypto from 'node:crypto';

export const TEST_PASSPHRASE = 'test-passphrase';
export const TEST_ORGANIZATION = 'Test Realm';

const DAY_MS = 24 * 60 * 60 * 1000;

let nextSerial = 1;

interface KeyPair {
    privateKey: forge.pki.rsa.PrivateKey;
    publicKey: forge.pki.rsa.PublicKey;
}

function generateKeyPair(): KeyPair {
    const { privateKey, publicKey } = crypto.generateKeyPairSync('rsa', {
        modulusLength: 2048,
        publicKeyEncoding: { type: 'spki', format: 'pem' },
        privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
    });
    return {
        privateKey: forge.pki.privateKeyFromPem(privateKey),
        publicKey: forge.pki.publicKeyFromPem(publicKey),
    };
}

function serial(): string {
    // Stays below 0x80, so no sign padding is needed.
    const value = (nextSerial++).toString(16);
    return value.length % 2 === 0 ? value : `0${value}`;
}

export interface IssuedCertificate {
    readonly commonName: string;
    readonly cert: forge.pki.Certificate;
    readonly key: forge.pki.rsa.PrivateKey;
    readonly certPem: string;
    readonly keyPem: string;
}

export interface LeafOptions {
    /** Validity window entirely in the past. */
    expired?: boolean;
}

export class TestAuthority {
    readonly root: IssuedCertificate;

    constructor(commonName: string) {
        const keys = generateKeyPair();
        const cert = forge.pki.createCertificate();
        cert.publicKey = keys.publicKey;
        cert.serialNumber = serial();
        cert.validity.notBefore = new Date(Date.now() - DAY_MS);
        cert.validity.notAfter = new Date(Date.now() + 30 * DAY_MS);
        const attrs = [{ name: 'commonName', value: commonName }, { name: 'organizationName', value: TEST_ORGANIZATION }];
        cert.setSubject(attrs);
        cert.setIssuer(attrs);
        cert.setExtensions([
            { name: 'basicConstraints', cA: true, critical: true },
            { name: 'keyUsage', keyCertSign: true, cRLSign: true, digitalSignature: true, critical: true },
            { name: 'subjectKeyIdentifier' },
        ]);
        cert.sign(keys.privateKey, forge.md.sha256.create());

        this.root = {
            commonName,
            cert,
            key: keys.privateKey,
            certPem: forge.pki.certificateToPem(cert),
            keyPem: forge.pki.privateKeyToPem(keys.privateKey),
        };
    }

    get pem(): Buffer {
        return Buffer.from(this.root.certPem, 'utf8');
    }

    /** DER encoding of the authority certificate. */
    get der(): Buffer {
        return Buffer.from(forge.asn1.toDer(forge.pki.certificateToAsn1(this.root.cert)).getBytes(), 'binary');
    }

    /**
     * Leaf usable for both TLS roles; SANs cover localhost and 127.0.0.1.
     */
    issue(commonName: string, options: LeafOptions = {}): IssuedCertificate {
        const keys = generateKeyPair();
        const cert = forge.pki.createCertificate();
        cert.publicKey = keys.publicKey;
        cert.serialNumber = serial();
        if (options.expired) {
            cert.validity.notBefore = new Date(Date.now() - 10 * DAY_MS);
            cert.validity.notAfter = new Date(Date.now() - DAY_MS);
        } else {
            cert.validity.notBefore = new Date(Date.now() - DAY_MS);
            cert.validity.notAfter = new Date(Date.now() + 7 * DAY_MS);
        }
        cert.setSubject([{ name: 'commonName', value: commonName }, { name: 'organizationName', value: TEST_ORGANIZATION }]);
        cert.setIssuer(this.root.cert.subject.attributes);
        cert.setExtensions([
            { name: 'basicConstraints', cA: false },
            { name: 'keyUsage', digitalSignature: true, keyEncipherment: true, critical: true },
            { name: 'extKeyUsage', serverAuth: true, clientAuth: true },
            { name: 'subjectAltName', altNames: [{ type: 2, value: 'localhost' }, { type: 7, ip: '127.0.0.1' }] },
        ]);
        cert.sign(this.root.key, forge.md.sha256.create());

        return {
            commonName,
            cert,
            key: keys.privateKey,
            certPem: forge.pki.certificateToPem(cert),
            keyPem: forge.pki.privateKeyToPem(keys.privateKey),
        };
    }
}

function toDerBuffer(asn1: forge.asn1.Asn1): Buffer {
    return Buffer.from(forge.asn1.toDer(asn1).getBytes(), 'binary');
}

/**
 * Password-protected archive: private key plus leaf and issuer certificates.
 */
export function keystore(leaf: IssuedCertificate, issuer: TestAuthority, passphrase = TEST_PASSPHRASE): Buffer {
    return toDerBuffer(forge.pkcs12.toPkcs12Asn1(leaf.key, [leaf.cert, issuer.root.cert], passphrase, {
        algorithm: '3des',
        friendlyName: leaf.commonName,
    }));
}

/**
 * Archive holding only certificates, as a trust store does.
 */
export function truststore(authorities: TestAuthority[], passphrase = TEST_PASSPHRASE): Buffer {
    return toDerBuffer(forge.pkcs12.toPkcs12Asn1(null, authorities.map(a => a.root.cert), passphrase, {
        algorithm: '3des',
    }));
}

/**
 * Archive whose key belongs to a different certificate than the one inside.
 */
export function mismatchedKeystore(leaf: IssuedCertificate, other: IssuedCertificate, passphrase = TEST_PASSPHRASE): Buffer {
    return toDerBuffer(forge.pkcs12.toPkcs12Asn1(other.key, [leaf.cert], passphrase, { algorithm: '3des' }));
}

export interface TestRealm {
    authority: TestAuthority;
    foreignAuthority: TestAuthority;
    server: IssuedCertificate;
    citizen: IssuedCertificate;
    expiredCitizen: IssuedCertificate;
    foreigner: IssuedCertificate;
}

/**
 * One trusted authority, one untrusted, and the leaves the tests use.
 */
export function createTestRealm(): TestRealm {
    const authority = new TestAuthority('Test Root CA');
    const foreignAuthority = new TestAuthority('Foreign Root CA');
    return {
        authority,
        foreignAuthority,
        server: authority.issue('localhost'),
        citizen: authority.issue('Bob'),
        expiredCitizen: authority.issue('Old Bob', { expired: true }),
        foreigner: foreignAuthority.issue('Mallory'),
    };
}
