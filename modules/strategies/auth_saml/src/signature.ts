/**
 * SAML Strategy - XML Signature Verification and Signing
 *
 * Verification runs structural checks first, then hands the document to
 * xml-crypto for exclusive canonicalization, digest comparison and the
 * RSA check of SignedInfo. The structural checks pin the signature to the
 * element the caller is about to trust:
 *
 * - exactly one ds:Signature, as a direct child of that element
 * - exactly one Reference, whose URI is "#" + that element's ID
 * - that ID occurs once in the whole document
 * - exclusive C14N only; enveloped-signature and exclusive C14N transforms only
 * - no SHA-1
 *
 * The key always comes from the configured certificate; KeyInfo in the
 * message is ignored.
 *
 * @see https://www.w3.org/TR/xmldsig-core1/
 * @see https://www.w3.org/TR/xml-exc-c14n/
 * @see https://www.usenix.org/conference/usenixsecurity12/technical-sessions/presentation/somorovsky
 */

import { createSign } from 'node:crypto';
import { SignedXml } from 'xml-crypto';
import {
    DIGEST_ALGORITHMS,
    NODE_SIGN_ALGORITHMS,
    SAML_NAMESPACES,
    SIGNATURE_ALGORITHMS,
    TRANSFORMS,
} from './constants';
import type { DigestAlgorithm, SignatureAlgorithm } from './constants';
import {
    attr,
    childElements,
    findElementsById,
    firstChild,
    getElementId,
    serializeXml,
} from './xml';

// =============================================================================
// Types
// =============================================================================

export interface SignatureCheck {
    valid: boolean;
    /** Why verification failed; safe to log */
    reason?: string;
}

export interface SignXmlOptions {
    privateKey: string;
    /** Published in KeyInfo */
    certificate: string;
    /** ID of the element to sign; the signature becomes its first child */
    referenceId: string;
    signatureAlgorithm: SignatureAlgorithm;
    digestAlgorithm: DigestAlgorithm;
}

const ALLOWED_SIGNATURE_ALGORITHMS: ReadonlySet<string> = new Set([
    SIGNATURE_ALGORITHMS.RSA_SHA256,
    SIGNATURE_ALGORITHMS.RSA_SHA512,
]);

const ALLOWED_DIGEST_ALGORITHMS: ReadonlySet<string> = new Set([
    DIGEST_ALGORITHMS.SHA256,
    DIGEST_ALGORITHMS.SHA512,
]);

const ALLOWED_TRANSFORMS: ReadonlySet<string> = new Set([
    TRANSFORMS.ENVELOPED_SIGNATURE,
    TRANSFORMS.EXCLUSIVE_C14N,
]);

const DS = SAML_NAMESPACES.DSIG;

function invalid(reason: string): SignatureCheck {
    return { valid: false, reason };
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Whether `element` carries an enveloped signature (direct child).
 */
export function hasSignature(element: Element): boolean {
    return childElements(element, DS, 'Signature').length > 0;
}

/**
 * Verify the enveloped signature of `element` against `certificate`.
 *
 * @param sourceXml - The document exactly as received. Digests are
 *   computed over it rather than over a re-serialized DOM.
 */
export function checkSignature(
    element: Element,
    certificate: string,
    sourceXml?: string
): SignatureCheck {
    const signatures = childElements(element, DS, 'Signature');
    if (signatures.length !== 1) {
        return invalid(`expected exactly one Signature on ${element.localName}, found ${signatures.length}`);
    }
    const signatureNode = signatures[0];

    const signedInfo = firstChild(signatureNode, DS, 'SignedInfo');
    if (!signedInfo) {
        return invalid('Signature has no SignedInfo');
    }

    // -------------------------------------------------------------------------
    // Algorithms
    // -------------------------------------------------------------------------

    const c14n = firstChild(signedInfo, DS, 'CanonicalizationMethod');
    if (!c14n || attr(c14n, 'Algorithm') !== TRANSFORMS.EXCLUSIVE_C14N) {
        return invalid('CanonicalizationMethod must be exclusive C14N');
    }

    const signatureMethod = firstChild(signedInfo, DS, 'SignatureMethod');
    const signatureAlgorithm = signatureMethod ? attr(signatureMethod, 'Algorithm') : undefined;
    if (signatureAlgorithm === SIGNATURE_ALGORITHMS.RSA_SHA1) {
        return invalid('SHA-1 signature algorithm is not allowed');
    }
    if (!signatureAlgorithm || !ALLOWED_SIGNATURE_ALGORITHMS.has(signatureAlgorithm)) {
        return invalid('unsupported SignatureMethod');
    }

    // -------------------------------------------------------------------------
    // Reference
    // -------------------------------------------------------------------------

    const references = childElements(signedInfo, DS, 'Reference');
    if (references.length !== 1) {
        return invalid(`expected exactly one Reference, found ${references.length}`);
    }
    const reference = references[0];

    const elementId = getElementId(element);
    if (!elementId) {
        return invalid(`${element.localName} has no ID attribute`);
    }

    if (reference.getAttribute('URI') !== `#${elementId}`) {
        return invalid('Reference URI does not point at the signed element');
    }

    const doc = element.ownerDocument;
    const owners = findElementsById(doc, elementId);
    if (owners.length !== 1 || owners[0] !== element) {
        return invalid(`ID ${elementId} is not unique in the document`);
    }

    const transformsNode = firstChild(reference, DS, 'Transforms');
    const transforms = transformsNode ? childElements(transformsNode, DS, 'Transform') : [];
    for (const transform of transforms) {
        const algorithm = attr(transform, 'Algorithm');
        if (!algorithm || !ALLOWED_TRANSFORMS.has(algorithm)) {
            return invalid(`transform ${algorithm ?? '(none)'} is not allowed`);
        }
    }

    const digestMethod = firstChild(reference, DS, 'DigestMethod');
    const digestAlgorithm = digestMethod ? attr(digestMethod, 'Algorithm') : undefined;
    if (digestAlgorithm === DIGEST_ALGORITHMS.SHA1) {
        return invalid('SHA-1 digest algorithm is not allowed');
    }
    if (!digestAlgorithm || !ALLOWED_DIGEST_ALGORITHMS.has(digestAlgorithm)) {
        return invalid('unsupported DigestMethod');
    }

    // -------------------------------------------------------------------------
    // Cryptographic check
    // -------------------------------------------------------------------------

    const verifier = new SignedXml({ publicCert: certificate });

    try {
        verifier.loadSignature(signatureNode);
        const ok = verifier.checkSignature(sourceXml ?? serializeXml(doc));
        return ok ? { valid: true } : invalid('digest or signature value mismatch');
    } catch (err) {
        return invalid(err instanceof Error ? err.message : String(err));
    }
}

/**
 * Boolean form of {@link checkSignature}.
 */
export function verifySignature(element: Element, certificate: string, sourceXml?: string): boolean {
    return checkSignature(element, certificate, sourceXml).valid;
}

// =============================================================================
// Signing
// =============================================================================

/**
 * Add an enveloped signature to the element with the given ID.
 *
 * @returns The signed document
 */
export function signXml(xml: string, options: SignXmlOptions): string {
    const xpath = `//*[@ID='${options.referenceId}']`;

    const signer = new SignedXml({
        privateKey: options.privateKey,
        publicCert: options.certificate,
        signatureAlgorithm: options.signatureAlgorithm,
        canonicalizationAlgorithm: TRANSFORMS.EXCLUSIVE_C14N,
    });

    signer.addReference({
        xpath,
        digestAlgorithm: options.digestAlgorithm,
        transforms: [TRANSFORMS.ENVELOPED_SIGNATURE, TRANSFORMS.EXCLUSIVE_C14N],
    });

    signer.computeSignature(xml, {
        location: { reference: xpath, action: 'prepend' },
    });

    return signer.getSignedXml();
}

/**
 * Sign an HTTP-Redirect binding query string.
 *
 * `query` must already be `SAMLRequest=…[&RelayState=…]&SigAlg=…` with
 * URL-encoded values; the IdP verifies over those exact bytes.
 *
 * @returns Base64 signature (not yet URL-encoded)
 *
 * @see SAML 2.0 Bindings Specification, Section 3.4.4.1
 */
export function signRedirectQuery(
    query: string,
    privateKey: string,
    algorithm: SignatureAlgorithm
): string {
    return createSign(NODE_SIGN_ALGORITHMS[algorithm])
        .update(query, 'utf8')
        .sign(privateKey, 'base64');
}
