/**
 * Tag-related types and interfaces.
 * Tags are short labels owned by a single user and attached to that user's recipes.
 */

/**
 * Tag entity as stored in the database.
 */
export interface Tag {
  id: number;
  name: string;
  userId: string;
  createdAt: string;
}

/**
 * Tag response shape for API responses.
 */
export interface TagResponse {
  id: number;
  name: string;
}

/**
 * Tag reference inside a recipe create/update payload.
 * Tags are matched by name against the requesting user's tags.
 */
export interface TagInput {
  name: string;
}

/**
 * Request body for updating a tag.
 */
export interface UpdateTagRequest {
  name: string;
}

/**
 * Which tags to return from the tag list, based on recipe assignment.
 * Over HTTP the `assigned_only` query parameter carries 0, 1 or 2.
 */
export type TagAssignmentFilter = 'all' | 'assigned' | 'unassigned';

/**
 * Response for GET /api/tags.
 */
export interface TagListResponse {
  tags: TagResponse[];
}
