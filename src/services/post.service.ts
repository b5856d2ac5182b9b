import { Sequelize, Transaction } from 'sequelize';
import winston from 'winston';
import { Database } from '../db/database';
import {
  Post,
  PostCreationAttributes,
  PostMapping,
  PostMappingCreationAttributes,
  PostWithMappings,
} from '../models/post.model';
import { PostRepository } from '../repositories/post.repository';
import { ConflictError, DuplicateKeyError, NotFoundError } from '../utils/errors';

export const POST_EXISTS_DETAIL = 'Post with this ID already exists';
export const POST_NOT_FOUND_DETAIL = 'Post not found';

export class PostService {
  private sequelize: Sequelize;
  private postRepository: PostRepository;
  private logger: winston.Logger;

  constructor(database: Database, postRepository: PostRepository, loggerInstance: winston.Logger) {
    this.sequelize = database.sequelize;
    this.postRepository = postRepository;
    this.logger = loggerInstance;
  }

  // Managed transaction: committed when work resolves, rolled back when it
  // throws, and the connection goes back to the pool in both cases.
  private inTransaction<T>(work: (transaction: Transaction) => Promise<T>): Promise<T> {
    return this.sequelize.transaction(work);
  }

  async createPost(postData: PostCreationAttributes, correlationId?: string): Promise<Post> {
    this.logger.info('PostService: createPost initiated', { correlationId, postId: postData.id, userId: postData.userId, type: 'ServiceLog.createPost' });
    return this.inTransaction(async (transaction) => {
      const existingPost = await this.postRepository.findPostById(postData.id, transaction, correlationId);
      if (existingPost) {
        this.logger.warn('PostService: createPost - Post id already exists', { correlationId, postId: postData.id, type: 'ServiceValidationWarn.createPostDuplicate' });
        throw new ConflictError(POST_EXISTS_DETAIL);
      }

      try {
        const createdPost = await this.postRepository.createPost(postData, transaction, correlationId);
        this.logger.info('PostService: Post created in repository', { correlationId, postId: createdPost.id, type: 'ServiceLog.createPostRepoSuccess' });
        return createdPost;
      } catch (error) {
        if (error instanceof DuplicateKeyError) {
          this.logger.warn('PostService: createPost - Post id taken by a concurrent request', { correlationId, postId: postData.id, type: 'ServiceValidationWarn.createPostRace' });
          throw new ConflictError(POST_EXISTS_DETAIL);
        }
        throw error;
      }
    });
  }

  async listPosts(correlationId?: string): Promise<PostWithMappings[]> {
    this.logger.info('PostService: listPosts initiated', { correlationId, type: 'ServiceLog.listPosts' });
    const posts = await this.inTransaction(transaction =>
      this.postRepository.findAllPostsWithMappings(transaction, correlationId)
    );
    this.logger.info(`PostService: listPosts found ${posts.length} posts`, { correlationId, count: posts.length, type: 'ServiceLog.listPostsResult' });
    return posts;
  }

  async createMapping(mappingData: PostMappingCreationAttributes, correlationId?: string): Promise<PostMapping> {
    this.logger.info('PostService: createMapping initiated', { correlationId, postId: mappingData.postId, userId: mappingData.userId, type: 'ServiceLog.createMapping' });
    return this.inTransaction(async (transaction) => {
      const post = await this.postRepository.findPostById(mappingData.postId, transaction, correlationId);
      if (!post) {
        this.logger.warn('PostService: createMapping - Post not found', { correlationId, postId: mappingData.postId, type: 'ServiceValidationWarn.createMappingPostNotFound' });
        throw new NotFoundError(POST_NOT_FOUND_DETAIL);
      }

      const mapping = await this.postRepository.createMapping(mappingData, transaction, correlationId);
      this.logger.info('PostService: createMapping successful', { correlationId, postId: mapping.postId, mappingId: mapping.id, type: 'ServiceLog.createMappingSuccess' });
      return mapping;
    });
  }

  async deletePost(postId: string, correlationId?: string): Promise<void> {
    this.logger.info('PostService: deletePost initiated', { correlationId, postId, type: 'ServiceLog.deletePost' });
    await this.inTransaction(async (transaction) => {
      const existingPost = await this.postRepository.findPostById(postId, transaction, correlationId);
      if (!existingPost) {
        this.logger.warn('PostService: deletePost - Post not found for deletion', { correlationId, postId, type: 'ServiceLog.deletePostNotFoundForDeletion' });
        throw new NotFoundError(POST_NOT_FOUND_DETAIL);
      }

      const success = await this.postRepository.deletePost(postId, transaction, correlationId);
      if (!success) {
        this.logger.warn('PostService: deletePost - Post vanished before deletion', { correlationId, postId, type: 'ServiceLog.deletePostRepoFail' });
        throw new NotFoundError(POST_NOT_FOUND_DETAIL);
      }
    });
    this.logger.info('PostService: deletePost successful', { correlationId, postId, type: 'ServiceLog.deletePostSuccess' });
  }
}
