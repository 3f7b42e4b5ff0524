/**
 * Application-wide constants shared across server modules.
 */

/**
 * The name of the HTTP-only cookie used to store session IDs.
 * This cookie is set on login and cleared on logout.
 */
export const COOKIE_NAME = 'larder_session';

/**
 * Scheme accepted in the Authorization header as an alternative to the
 * session cookie: `Authorization: Token <session id>`.
 */
export const AUTH_TOKEN_SCHEME = 'Token';

/**
 * Lifetime of presigned image URLs returned after an upload (7 days).
 */
export const IMAGE_URL_EXPIRY_SECONDS = 604800;

/**
 * Maximum number of labels requested from label detection per image.
 */
export const MAX_IMAGE_LABELS = 10;

/**
 * Image content types accepted by the recipe image upload.
 * Maps the MIME type to the file extension used for the stored reference.
 */
export const IMAGE_CONTENT_TYPES: ReadonlyMap<string, string> = new Map([
  ['image/jpeg', '.jpg'],
  ['image/png', '.png'],
  ['image/gif', '.gif'],
  ['image/webp', '.webp'],
]);
