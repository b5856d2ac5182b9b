export interface Post {
  id: string;
  userId: string;
  content: string;
  mediaUrl: string | null;
  createdAt: Date | null;
  updatedAt: Date | null;
}

export interface PostMapping {
  id: number;
  userId: string;
  postId: string;
  comments: string | null;
  liked: boolean;
  disliked: boolean;
  createdAt: Date | null;
  updatedAt: Date | null;
}

export interface PostWithMappings extends Post {
  mappings: PostMapping[];
}

export interface PostCreationAttributes {
  id: string;
  userId: string;
  content: string;
  mediaUrl?: string | null;
}

export interface PostMappingCreationAttributes {
  postId: string;
  userId: string;
  comments?: string | null;
  liked?: boolean;
  disliked?: boolean;
}

// Wire shapes: mapping keys are snake_case and `like` is a string.
export interface PostMappingView {
  id: number;
  post_id: string;
  comments: string | null;
  like: 'true' | 'false';
  dislike: boolean;
}

export interface PostView {
  id: string;
  userId: string;
  content: string;
  imageUrl: string | null;
  userPostmapping: PostMappingView[];
  createdAt: string | null;
}

export type EnvelopeStatus = 'published' | 'deleted';

export interface Envelope<T> {
  status: EnvelopeStatus;
  message: string;
  data?: T[];
}
