import { Router } from 'express';
import { PostController } from '../controllers/post.controller';

export const setupPostRoutes = (postController: PostController): Router => {
  const router = Router();

  router.post('/posts/', (req, res) => postController.createPost(req, res));
  router.get('/posts/', (req, res) => postController.listPosts(req, res));
  router.post('/posts/response/', (req, res) => postController.createMapping(req, res));
  router.delete('/posts/:postId', (req, res) => postController.deletePost(req, res));

  return router;
};
