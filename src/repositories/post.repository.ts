import { ForeignKeyConstraintError, Transaction, UniqueConstraintError } from 'sequelize';
import winston from 'winston';
import { Database } from '../db/database';
import { MAPPINGS_ALIAS, PostMappingModel, PostModel, PostModels } from '../db/models';
import {
  Post,
  PostCreationAttributes,
  PostMapping,
  PostMappingCreationAttributes,
  PostWithMappings,
} from '../models/post.model';
import { DatabaseError, DuplicateKeyError, NotFoundError, errorMessage, errorStack } from '../utils/errors';

export class PostRepository {
  private models: PostModels;
  private logger: winston.Logger;

  constructor(database: Database, loggerInstance: winston.Logger) {
    this.models = database.models;
    this.logger = loggerInstance;
  }

  private toPost(row: PostModel): Post {
    return {
      id: row.id,
      userId: row.userId,
      content: row.content,
      mediaUrl: row.mediaUrl ?? null,
      createdAt: row.createdAt ?? null,
      updatedAt: row.updatedAt ?? null,
    };
  }

  private toPostOptional(row: PostModel | null): Post | undefined {
    return row ? this.toPost(row) : undefined;
  }

  // Some dialects hand booleans back as 0/1.
  private toMapping(row: PostMappingModel): PostMapping {
    return {
      id: row.id,
      userId: row.userId,
      postId: row.postId,
      comments: row.comments ?? null,
      liked: Boolean(row.liked),
      disliked: Boolean(row.disliked),
      createdAt: row.createdAt ?? null,
      updatedAt: row.updatedAt ?? null,
    };
  }

  private toPostWithMappings(row: PostModel): PostWithMappings {
    return {
      ...this.toPost(row),
      mappings: (row.mappings ?? []).map(mapping => this.toMapping(mapping)),
    };
  }

  private logQuery(details: string, params: unknown, correlationId?: string, operation?: string) {
    this.logger.debug(`PostRepository: Executing DB operation`, {
      correlationId,
      operation: operation || 'UnknownDBOperation',
      details,
      params: process.env.NODE_ENV !== 'production' ? params : '[values_hidden_in_prod]',
      type: 'DBLog.Query',
    });
  }

  private fail(operation: string, error: unknown, meta: Record<string, unknown>): DatabaseError {
    this.logger.error(`PostRepository: Error in ${operation}`, {
      ...meta,
      error: errorMessage(error),
      stack: errorStack(error),
      type: `DBError.${operation}`,
    });
    return new DatabaseError(errorMessage(error));
  }

  async createPost(post: PostCreationAttributes, transaction: Transaction, correlationId?: string): Promise<Post> {
    const operation = 'createPost';
    this.logger.info(`PostRepository: ${operation} initiated`, { correlationId, postId: post.id, userId: post.userId, type: `DBLog.${operation}` });
    const creationData = {
      id: post.id,
      userId: post.userId,
      content: post.content,
      mediaUrl: post.mediaUrl ?? null,
    };
    try {
      this.logQuery(`PostModel.create`, creationData, correlationId, operation);
      const newPost = await this.models.Post.create(creationData, { transaction });
      this.logger.info(`PostRepository: ${operation} successful`, { correlationId, postId: newPost.id, type: `DBLog.${operation}Success` });
      return this.toPost(newPost);
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        this.logger.warn(`PostRepository: ${operation} - Post id already taken`, { correlationId, postId: post.id, type: `DBLog.${operation}Duplicate` });
        throw new DuplicateKeyError(post.id);
      }
      throw this.fail(operation, error, { correlationId, postId: post.id });
    }
  }

  async findPostById(postId: string, transaction: Transaction, correlationId?: string): Promise<Post | undefined> {
    const operation = 'findPostById';
    this.logger.info(`PostRepository: ${operation} initiated`, { correlationId, postId, type: `DBLog.${operation}` });
    try {
      this.logQuery(`PostModel.findByPk`, { postId }, correlationId, operation);
      const postInstance = await this.models.Post.findByPk(postId, { transaction });
      if (postInstance) {
        this.logger.info(`PostRepository: ${operation} found post`, { correlationId, postId, type: `DBLog.${operation}Found` });
      } else {
        this.logger.info(`PostRepository: ${operation} post not found`, { correlationId, postId, type: `DBLog.${operation}NotFound` });
      }
      return this.toPostOptional(postInstance);
    } catch (error) {
      throw this.fail(operation, error, { correlationId, postId });
    }
  }

  async findAllPostsWithMappings(transaction: Transaction, correlationId?: string): Promise<PostWithMappings[]> {
    const operation = 'findAllPostsWithMappings';
    this.logger.info(`PostRepository: ${operation} initiated`, { correlationId, type: `DBLog.${operation}` });
    try {
      this.logQuery(`PostModel.findAll including mappings`, {}, correlationId, operation);
      const posts = await this.models.Post.findAll({
        include: [{ model: this.models.PostMapping, as: MAPPINGS_ALIAS, required: false }],
        order: [
          ['createdAt', 'ASC'],
          [{ model: this.models.PostMapping, as: MAPPINGS_ALIAS }, 'id', 'ASC'],
        ],
        transaction,
      });
      this.logger.info(`PostRepository: ${operation} found ${posts.length} posts`, { correlationId, count: posts.length, type: `DBLog.${operation}Result` });
      return posts.map(post => this.toPostWithMappings(post));
    } catch (error) {
      throw this.fail(operation, error, { correlationId });
    }
  }

  async createMapping(mapping: PostMappingCreationAttributes, transaction: Transaction, correlationId?: string): Promise<PostMapping> {
    const operation = 'createMapping';
    this.logger.info(`PostRepository: ${operation} initiated`, { correlationId, postId: mapping.postId, userId: mapping.userId, type: `DBLog.${operation}` });
    const creationData = {
      postId: mapping.postId,
      userId: mapping.userId,
      comments: mapping.comments ?? null,
      liked: mapping.liked ?? false,
      disliked: mapping.disliked ?? false,
    };
    try {
      this.logQuery(`PostMappingModel.create`, creationData, correlationId, operation);
      const newMapping = await this.models.PostMapping.create(creationData, { transaction });
      this.logger.info(`PostRepository: ${operation} successful`, { correlationId, mappingId: newMapping.id, type: `DBLog.${operation}Success` });
      return this.toMapping(newMapping);
    } catch (error) {
      if (error instanceof ForeignKeyConstraintError) {
        this.logger.warn(`PostRepository: ${operation} - Referenced post does not exist`, { correlationId, postId: mapping.postId, type: `DBLog.${operation}MissingPost` });
        throw new NotFoundError('Post not found');
      }
      throw this.fail(operation, error, { correlationId, postId: mapping.postId });
    }
  }

  /**
   * Removes the post and every mapping pointing at it. Both statements run on
   * the caller's transaction, so they commit or roll back together.
   */
  async deletePost(postId: string, transaction: Transaction, correlationId?: string): Promise<boolean> {
    const operation = 'deletePost';
    this.logger.info(`PostRepository: ${operation} initiated`, { correlationId, postId, type: `DBLog.${operation}` });
    try {
      this.logQuery(`PostMappingModel.destroy for post`, { where: { postId } }, correlationId, operation + 'DeleteMappings');
      const removedMappings = await this.models.PostMapping.destroy({ where: { postId }, transaction });

      this.logQuery(`PostModel.destroy`, { where: { id: postId } }, correlationId, operation);
      const numberOfDeletedRows = await this.models.Post.destroy({ where: { id: postId }, transaction });

      const success = numberOfDeletedRows > 0;
      this.logger.info(`PostRepository: ${operation} ${success ? 'successful' : 'failed (post not found)'}`, { correlationId, postId, success, removedMappings, type: `DBLog.${operation}Result` });
      return success;
    } catch (error) {
      throw this.fail(operation, error, { correlationId, postId });
    }
  }
}
