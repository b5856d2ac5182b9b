import {
  Envelope,
  EnvelopeStatus,
  Post,
  PostMapping,
  PostMappingView,
  PostView,
  PostWithMappings,
} from '../models/post.model';

/**
 * Renders the stored UTC instant without an offset, then appends a literal "Z".
 */
export const formatCreatedAt = (timestamp: Date | null): string | null => {
  if (!timestamp) return null;
  const naiveUtc = timestamp.toISOString().slice(0, -1);
  return naiveUtc + 'Z';
};

export const serializeMapping = (mapping: PostMapping): PostMappingView => ({
  id: mapping.id,
  post_id: mapping.postId,
  comments: mapping.comments,
  like: mapping.liked ? 'true' : 'false',
  dislike: mapping.disliked,
});

export const serializePost = (post: Post, mappings: PostMapping[] = []): PostView => ({
  id: post.id,
  userId: post.userId,
  content: post.content,
  imageUrl: post.mediaUrl,
  userPostmapping: mappings.map(serializeMapping),
  createdAt: formatCreatedAt(post.createdAt),
});

export const serializePostWithMappings = (post: PostWithMappings): PostView =>
  serializePost(post, post.mappings);

export function envelope<T>(status: EnvelopeStatus, message: string, data: T[]): Envelope<T>;
export function envelope(status: EnvelopeStatus, message: string): Envelope<never>;
export function envelope<T>(status: EnvelopeStatus, message: string, data?: T[]): Envelope<T> {
  return data === undefined ? { status, message } : { status, message, data };
}
