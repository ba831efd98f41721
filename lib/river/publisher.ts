/**
 * Social Publisher
 *
 * Uploads chart images and posts the summary with them attached. Failures are
 * fatal for the run: nothing is retried and no text-only post is attempted.
 */

import { EUploadMimeType, TwitterApi } from 'twitter-api-v2';
import type { SendTweetV2Params } from 'twitter-api-v2';
import type { SocialCredentials } from './config';
import { PublishError } from './errors';
import type { ChartImage } from './types';

export const MAX_MEDIA_PER_POST = 4;

export interface SocialClient {
  uploadMedia(image: ChartImage): Promise<string>;
  createPost(text: string, mediaIds: string[]): Promise<string>;
}

export interface PublishResult {
  postId: string;
  mediaIds: string[];
}

// ============================================================================
// TWITTER CLIENT
// ============================================================================

type MediaIdList = NonNullable<NonNullable<SendTweetV2Params['media']>['media_ids']>;

function toMediaIdList(ids: readonly string[]): MediaIdList {
  const [a, b, c, d] = ids;
  switch (ids.length) {
    case 1:
      return [a];
    case 2:
      return [a, b];
    case 3:
      return [a, b, c];
    case 4:
      return [a, b, c, d];
    default:
      throw new PublishError(`A post takes 1 to ${MAX_MEDIA_PER_POST} media items (got ${ids.length})`);
  }
}

function mimeTypeFor(filename: string): EUploadMimeType {
  const extension = filename.split('.').pop()?.toLowerCase();
  switch (extension) {
    case 'png':
      return EUploadMimeType.Png;
    case 'jpg':
    case 'jpeg':
      return EUploadMimeType.Jpeg;
    default:
      throw new PublishError(`Unsupported media type for ${filename}`);
  }
}

/**
 * OAuth 1.0a user-context client from the four credential values.
 */
export function createTwitterClient(credentials: SocialCredentials): SocialClient {
  const api = new TwitterApi({
    appKey: credentials.consumerKey,
    appSecret: credentials.consumerSecret,
    accessToken: credentials.accessToken,
    accessSecret: credentials.accessTokenSecret,
  });

  return {
    async uploadMedia(image) {
      return api.v1.uploadMedia(image.data, { mimeType: mimeTypeFor(image.filename) });
    },
    async createPost(text, mediaIds) {
      const payload = mediaIds.length > 0 ? { media: { media_ids: toMediaIdList(mediaIds) } } : {};
      const { data } = await api.v2.tweet(text, payload);
      return data.id;
    },
  };
}

// ============================================================================
// PUBLISHING
// ============================================================================

/**
 * Upload every image in order, then create one post carrying all of them.
 */
export async function publishUpdate(
  client: SocialClient,
  text: string,
  images: readonly ChartImage[]
): Promise<PublishResult> {
  if (images.length > MAX_MEDIA_PER_POST) {
    throw new PublishError(`A post takes at most ${MAX_MEDIA_PER_POST} images (got ${images.length})`);
  }

  const mediaIds: string[] = [];
  for (const image of images) {
    try {
      const mediaId = await client.uploadMedia(image);
      console.log(`[River Publisher] Uploaded ${image.filename} as media ${mediaId}`);
      mediaIds.push(mediaId);
    } catch (error) {
      throw new PublishError(`Failed to upload ${image.filename}`, { cause: error });
    }
  }

  let postId: string;
  try {
    postId = await client.createPost(text, mediaIds);
  } catch (error) {
    throw new PublishError('Failed to create post', { cause: error });
  }

  console.log(`[River Publisher] Created post ${postId} with ${mediaIds.length} images`);
  return { postId, mediaIds };
}
