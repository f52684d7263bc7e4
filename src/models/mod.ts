export { User } from './user.ts';
export { Post } from './post.ts';
