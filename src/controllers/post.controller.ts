import { Response } from 'express';
import winston from 'winston';
import { PostService } from '../services/post.service';
import { envelope, serializeMapping, serializePost, serializePostWithMappings } from '../serializers/post.serializer';
import { HttpError, RequestValidationError, errorMessage, errorStack, internalErrorBody } from '../utils/errors';
import { RequestWithId } from '../utils/logger';
import { createMappingSchema, createPostSchema, parseBody } from '../utils/validation';

export class PostController {
  private postService: PostService;
  private logger: winston.Logger;

  constructor(postService: PostService, loggerInstance: winston.Logger) {
    this.postService = postService;
    this.logger = loggerInstance;
  }

  private handleError(res: Response, error: unknown, operation: string, correlationId?: string) {
    if (error instanceof RequestValidationError) {
      this.logger.warn(`PostController: ${operation} - Invalid request body`, { correlationId, errors: error.errors, type: `ControllerValidationWarn.${operation}` });
      return res.status(error.status).json({ detail: error.detail, errors: error.errors, correlationId });
    }
    if (error instanceof HttpError) {
      this.logger.warn(`PostController: ${operation} failed - ${error.detail}`, { correlationId, status: error.status, type: `ControllerClientError.${operation}` });
      return res.status(error.status).json({ detail: error.detail, correlationId });
    }
    this.logger.error(`PostController: ${operation} - Internal server error`, { correlationId, error: errorMessage(error), stack: errorStack(error), type: `ControllerError.${operation}` });
    return res.status(500).json(internalErrorBody(error, correlationId));
  }

  async createPost(req: RequestWithId, res: Response) {
    const correlationId = req.id;
    this.logger.info('PostController: createPost initiated', { correlationId, body: req.body, type: 'ControllerLog.createPost' });
    try {
      const body = parseBody(createPostSchema, req.body);
      const post = await this.postService.createPost({
        id: body.id,
        userId: body.user_id,
        content: body.content,
        mediaUrl: body.media_url,
      }, correlationId);
      this.logger.info('PostController: createPost successful', { correlationId, postId: post.id, type: 'ControllerLog.createPostSuccess' });
      res.json(envelope('published', 'Post created successfully.', [serializePost(post)]));
    } catch (error) {
      this.handleError(res, error, 'createPost', correlationId);
    }
  }

  async listPosts(req: RequestWithId, res: Response) {
    const correlationId = req.id;
    this.logger.info('PostController: listPosts initiated', { correlationId, type: 'ControllerLog.listPosts' });
    try {
      const posts = await this.postService.listPosts(correlationId);
      this.logger.info(`PostController: listPosts successful, found ${posts.length} posts`, { correlationId, count: posts.length, type: 'ControllerLog.listPostsSuccess' });
      res.json(envelope('published', 'Posts fetched successfully.', posts.map(serializePostWithMappings)));
    } catch (error) {
      this.handleError(res, error, 'listPosts', correlationId);
    }
  }

  async createMapping(req: RequestWithId, res: Response) {
    const correlationId = req.id;
    this.logger.info('PostController: createMapping initiated', { correlationId, body: req.body, type: 'ControllerLog.createMapping' });
    try {
      const body = parseBody(createMappingSchema, req.body);
      const mapping = await this.postService.createMapping({
        postId: body.post_id,
        userId: body.user_id,
        comments: body.comments,
        liked: body.liked,
        disliked: body.disliked,
      }, correlationId);
      this.logger.info('PostController: createMapping successful', { correlationId, postId: mapping.postId, mappingId: mapping.id, type: 'ControllerLog.createMappingSuccess' });
      res.json(envelope('published', 'User response added successfully.', [serializeMapping(mapping)]));
    } catch (error) {
      this.handleError(res, error, 'createMapping', correlationId);
    }
  }

  async deletePost(req: RequestWithId, res: Response) {
    const correlationId = req.id;
    const postId = req.params.postId;
    this.logger.info('PostController: deletePost initiated', { correlationId, postId, type: 'ControllerLog.deletePost' });
    try {
      await this.postService.deletePost(postId, correlationId);
      this.logger.info('PostController: deletePost successful', { correlationId, postId, type: 'ControllerLog.deletePostSuccess' });
      res.json(envelope('deleted', 'Post deleted successfully.'));
    } catch (error) {
      this.handleError(res, error, 'deletePost', correlationId);
    }
  }
}
