// Node only: uses node:crypto and the server's public id secret. Not part of
// the client barrel.

import { decodePublicId, encodePublicId } from '../utils/public-id.js';

/** Builds a share URL carrying the post's public token instead of its numeric id. */
export function shareLinkForPost(baseUrl: string, postId: number, secret: string): string {
  const root = baseUrl.replace(/\/+$/, '');
  return `${root}/posts/${encodePublicId(postId, secret)}`;
}

export function postIdFromShareToken(token: string, secret: string): number | null {
  return decodePublicId(token, secret);
}
