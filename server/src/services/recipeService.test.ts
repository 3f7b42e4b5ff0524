import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { eq } from 'drizzle-orm';
import type { CreateRecipeRequest, ImageAnalysisResult } from '@larder/shared';
import { runMigrations } from '../db/migrate.js';
import * as schema from '../db/schema.js';
import * as recipeService from './recipeService.js';
import * as tagService from './tagService.js';
import type { ImageAnalysisInput, ImageLabeler } from './imageLabeler.js';
import { ImageAnalysisError, NotFoundError, ValidationError } from '../errors/AppError.js';

/**
 * In-process labeler that records its inputs and answers with a canned result.
 */
class FakeLabeler implements ImageLabeler {
  readonly calls: ImageAnalysisInput[] = [];

  constructor(private readonly result: ImageAnalysisResult) {}

  async analyze(input: ImageAnalysisInput): Promise<ImageAnalysisResult> {
    this.calls.push(input);
    return this.result;
  }
}

describe('Recipe Service', () => {
  let sqlite: Database.Database;
  let db: BetterSQLite3Database<typeof schema>;

  /**
   * Creates a fresh in-memory database with migrations applied.
   */
  function createTestDb() {
    const sqliteDb = new Database(':memory:');
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('foreign_keys = ON');
    runMigrations(sqliteDb);
    return { sqlite: sqliteDb, db: drizzle(sqliteDb, { schema }) };
  }

  function createTestUser(id: string) {
    const now = new Date().toISOString();
    db.insert(schema.users)
      .values({
        id,
        email: `${id}@example.com`,
        passwordHash: 'test-hash',
        createdAt: now,
        updatedAt: now,
      })
      .run();
  }

  function recipeInput(overrides: Partial<CreateRecipeRequest> = {}): CreateRecipeRequest {
    return {
      title: 'Sample recipe',
      description: 'Sample description',
      timeMinutes: 22,
      price: '5.25',
      ...overrides,
    };
  }

  function countRows() {
    return {
      recipes: db.select().from(schema.recipes).all().length,
      tags: db.select().from(schema.tags).all().length,
      links: db.select().from(schema.recipeTags).all().length,
    };
  }

  beforeEach(() => {
    const testDb = createTestDb();
    sqlite = testDb.sqlite;
    db = testDb.db;
    createTestUser('user-a');
    createTestUser('user-b');
  });

  afterEach(() => {
    sqlite.close();
  });

  describe('parseTagIdFilter()', () => {
    it('returns undefined without a filter', () => {
      expect(recipeService.parseTagIdFilter(undefined)).toBeUndefined();
      expect(recipeService.parseTagIdFilter('')).toBeUndefined();
      expect(recipeService.parseTagIdFilter('  ')).toBeUndefined();
    });

    it('parses comma-separated ids, trimming whitespace', () => {
      expect(recipeService.parseTagIdFilter('2,3')).toEqual([2, 3]);
      expect(recipeService.parseTagIdFilter(' 7 , 11 ')).toEqual([7, 11]);
    });

    it('accepts leading zeros', () => {
      expect(recipeService.parseTagIdFilter('01,002')).toEqual([1, 2]);
    });

    it.each(['abc', '1,,2', '0', '00', '-3', '1.5', '2,x', '1e2'])('rejects %p', (raw) => {
      expect(() => recipeService.parseTagIdFilter(raw)).toThrow(ValidationError);
    });

    it('reports the offending element under /tags', () => {
      let caught: unknown;
      try {
        recipeService.parseTagIdFilter('1,abc');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught instanceof ValidationError && caught.details).toEqual({
        fields: [
          {
            path: '/tags',
            message: 'Tag filter must be a comma-separated list of positive integers, got: "abc"',
          },
        ],
      });
    });
  });

  describe('listRecipes()', () => {
    it('returns empty array when the user has no recipes', () => {
      expect(recipeService.listRecipes(db, 'user-a')).toEqual([]);
    });

    it('returns only the user recipes, newest first', () => {
      // Given: Two recipes for A, one for B
      const first = recipeService.createRecipe(db, 'user-a', recipeInput({ title: 'First' }));
      recipeService.createRecipe(db, 'user-b', recipeInput({ title: 'Other' }));
      const second = recipeService.createRecipe(db, 'user-a', recipeInput({ title: 'Second' }));

      // When: Listing A's recipes
      const result = recipeService.listRecipes(db, 'user-a');

      // Then: Descending id, B's recipe absent
      expect(result.map((r) => r.id)).toEqual([second.id, first.id]);
    });

    it('renders the summary shape with tags sorted by name', () => {
      const created = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({
          price: 5.5,
          link: 'https://example.com/r',
          tags: [{ name: 'Thai' }, { name: 'Curry' }],
        }),
      );

      const [summary] = recipeService.listRecipes(db, 'user-a');

      const curry = created.tags.find((t) => t.name === 'Curry');
      const thai = created.tags.find((t) => t.name === 'Thai');
      expect(summary).toEqual({
        id: created.id,
        title: 'Sample recipe',
        timeMinutes: 22,
        price: '5.50',
        link: 'https://example.com/r',
        tags: [
          { id: curry?.id, name: 'Curry' },
          { id: thai?.id, name: 'Thai' },
        ],
      });
    });

    it('filters by any of the given tag ids without duplicates', () => {
      // Given: Recipes with various tag combinations
      const veganOnly = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ title: 'Vegan only', tags: [{ name: 'Vegan' }] }),
      );
      const dessertOnly = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ title: 'Dessert only', tags: [{ name: 'Dessert' }] }),
      );
      recipeService.createRecipe(db, 'user-a', recipeInput({ title: 'Untagged' }));
      const both = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ title: 'Both', tags: [{ name: 'Vegan' }, { name: 'Dessert' }] }),
      );
      const vegan = tagService.findOrCreateTag(db, 'user-a', 'Vegan');
      const dessert = tagService.findOrCreateTag(db, 'user-a', 'Dessert');

      // When: Filtering by both tag ids
      const result = recipeService.listRecipes(db, 'user-a', {
        tags: `${vegan.id},${dessert.id}`,
      });

      // Then: Every matching recipe once, newest first
      expect(result.map((r) => r.id)).toEqual([both.id, dessertOnly.id, veganOnly.id]);
    });

    it('filters with a single tag id', () => {
      recipeService.createRecipe(db, 'user-a', recipeInput({ tags: [{ name: 'Vegan' }] }));
      const dessert = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ tags: [{ name: 'Dessert' }] }),
      );

      const result = recipeService.listRecipes(db, 'user-a', {
        tags: String(dessert.tags[0].id),
      });

      expect(result.map((r) => r.id)).toEqual([dessert.id]);
    });

    it('never returns recipes of other users, even for their tag ids', () => {
      const theirs = recipeService.createRecipe(
        db,
        'user-b',
        recipeInput({ tags: [{ name: 'Vegan' }] }),
      );

      const result = recipeService.listRecipes(db, 'user-a', {
        tags: String(theirs.tags[0].id),
      });

      expect(result).toEqual([]);
    });

    it('treats an empty filter as no filter', () => {
      const created = recipeService.createRecipe(db, 'user-a', recipeInput());

      expect(recipeService.listRecipes(db, 'user-a', { tags: '' }).map((r) => r.id)).toEqual([
        created.id,
      ]);
    });
  });

  describe('getRecipeDetail()', () => {
    it('returns the detail of an own recipe', () => {
      const created = recipeService.createRecipe(db, 'user-a', recipeInput());

      const detail = recipeService.getRecipeDetail(db, 'user-a', created.id);

      expect(detail).toEqual(created);
      expect(detail.description).toBe('Sample description');
      expect(detail.image).toBeNull();
    });

    it('reports a recipe of another user as not found', () => {
      const theirs = recipeService.createRecipe(db, 'user-b', recipeInput());

      expect(() => recipeService.getRecipeDetail(db, 'user-a', theirs.id)).toThrow(
        new NotFoundError('Recipe not found'),
      );
    });
  });

  describe('createRecipe()', () => {
    it('creates a recipe without tags', () => {
      const created = recipeService.createRecipe(db, 'user-a', recipeInput());

      expect(created).toMatchObject({
        title: 'Sample recipe',
        description: 'Sample description',
        timeMinutes: 22,
        price: '5.25',
        link: '',
        image: null,
        tags: [],
      });
      const stored = db
        .select()
        .from(schema.recipes)
        .where(eq(schema.recipes.id, created.id))
        .get();
      expect(stored?.userId).toBe('user-a');
      expect(stored?.priceCents).toBe(525);
    });

    it('creates new tags for the user', () => {
      const created = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ tags: [{ name: 'Thai' }, { name: 'Dinner' }] }),
      );

      expect(created.tags.map((t) => t.name)).toEqual(['Dinner', 'Thai']);
      const stored = db.select().from(schema.tags).where(eq(schema.tags.userId, 'user-a')).all();
      expect(stored.map((t) => t.name).sort()).toEqual(['Dinner', 'Thai']);
    });

    it('reuses an existing tag of the same name', () => {
      // Given: A already has a Vegan tag
      const vegan = tagService.findOrCreateTag(db, 'user-a', 'Vegan');

      // When: Creating a recipe tagged Vegan and Thai
      const created = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ tags: [{ name: 'Vegan' }, { name: 'Thai' }] }),
      );

      // Then: Vegan is the existing row, only Thai is new
      expect(created.tags.find((t) => t.name === 'Vegan')?.id).toBe(vegan.id);
      expect(countRows().tags).toBe(2);
    });

    it('does not reuse a tag of another user', () => {
      const theirs = tagService.findOrCreateTag(db, 'user-b', 'Vegan');

      const created = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ tags: [{ name: 'Vegan' }] }),
      );

      expect(created.tags[0].id).not.toBe(theirs.id);
      expect(countRows().tags).toBe(2);
    });

    it('collapses repeated tag names into one link', () => {
      const created = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ tags: [{ name: 'Vegan' }, { name: ' Vegan ' }] }),
      );

      expect(created.tags).toHaveLength(1);
      expect(countRows()).toEqual({ recipes: 1, tags: 1, links: 1 });
    });

    it('leaves nothing behind when a tag name is invalid', () => {
      expect(() =>
        recipeService.createRecipe(
          db,
          'user-a',
          recipeInput({ tags: [{ name: 'Fine' }, { name: '   ' }] }),
        ),
      ).toThrow(ValidationError);

      expect(countRows()).toEqual({ recipes: 0, tags: 0, links: 0 });
    });

    const invalidInputs: Array<[string, Partial<CreateRecipeRequest>]> = [
      ['title', { title: '  ' }],
      ['timeMinutes', { timeMinutes: 0 }],
      ['timeMinutes', { timeMinutes: 2.5 }],
      ['price', { price: '1000' }],
      ['price', { price: -1 }],
      ['price', { price: '1.234' }],
      ['link', { link: 'x'.repeat(256) }],
    ];

    it.each(invalidInputs)('rejects an invalid %s', (_field, overrides) => {
      expect(() => recipeService.createRecipe(db, 'user-a', recipeInput(overrides))).toThrow(
        ValidationError,
      );
      expect(countRows().recipes).toBe(0);
    });

    it('accepts the price bounds', () => {
      expect(recipeService.createRecipe(db, 'user-a', recipeInput({ price: 0 })).price).toBe(
        '0.00',
      );
      expect(
        recipeService.createRecipe(db, 'user-a', recipeInput({ price: '999.99' })).price,
      ).toBe('999.99');
    });
  });

  describe('updateRecipe()', () => {
    it('updates only the given fields and keeps tags', () => {
      const created = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ tags: [{ name: 'Thai' }] }),
      );

      const updated = recipeService.updateRecipe(db, 'user-a', created.id, {
        title: 'New title',
      });

      expect(updated.title).toBe('New title');
      expect(updated.description).toBe('Sample description');
      expect(updated.price).toBe('5.25');
      expect(updated.tags).toEqual(created.tags);
    });

    it('replaces the whole tag set when tags are given', () => {
      // Given: A recipe tagged Thai and Vegan
      const created = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ tags: [{ name: 'Thai' }, { name: 'Vegan' }] }),
      );

      // When: Patching tags to just Curry
      const updated = recipeService.updateRecipe(db, 'user-a', created.id, {
        tags: [{ name: 'Curry' }],
      });

      // Then: Only Curry is linked, old tags still exist
      expect(updated.tags.map((t) => t.name)).toEqual(['Curry']);
      expect(tagService.listTags(db, 'user-a').map((t) => t.name)).toEqual([
        'Vegan',
        'Thai',
        'Curry',
      ]);
    });

    it('clears tags with an empty list but keeps the tag rows', () => {
      const created = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ tags: [{ name: 'Thai' }] }),
      );

      const updated = recipeService.updateRecipe(db, 'user-a', created.id, { tags: [] });

      expect(updated.tags).toEqual([]);
      expect(countRows()).toEqual({ recipes: 1, tags: 1, links: 0 });
    });

    it('changes nothing for an empty payload', () => {
      const created = recipeService.createRecipe(db, 'user-a', recipeInput());

      const updated = recipeService.updateRecipe(db, 'user-a', created.id, {});

      expect(updated).toEqual(created);
    });

    it('reports a recipe of another user as not found and leaves it untouched', () => {
      const theirs = recipeService.createRecipe(db, 'user-b', recipeInput());

      expect(() =>
        recipeService.updateRecipe(db, 'user-a', theirs.id, { title: 'Hijacked' }),
      ).toThrow(NotFoundError);
      expect(recipeService.getRecipeDetail(db, 'user-b', theirs.id).title).toBe('Sample recipe');
    });

    it('rolls back field changes when a tag name is invalid', () => {
      const created = recipeService.createRecipe(db, 'user-a', recipeInput());

      expect(() =>
        recipeService.updateRecipe(db, 'user-a', created.id, {
          title: 'Changed',
          tags: [{ name: '' }],
        }),
      ).toThrow(ValidationError);

      expect(recipeService.getRecipeDetail(db, 'user-a', created.id).title).toBe('Sample recipe');
    });
  });

  describe('replaceRecipe()', () => {
    it('overwrites every field and resets an omitted link', () => {
      const created = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ link: 'https://example.com/old', tags: [{ name: 'Thai' }] }),
      );

      const replaced = recipeService.replaceRecipe(db, 'user-a', created.id, {
        title: 'Replaced',
        description: 'New description',
        timeMinutes: 45,
        price: '12.00',
      });

      expect(replaced).toMatchObject({
        id: created.id,
        title: 'Replaced',
        description: 'New description',
        timeMinutes: 45,
        price: '12.00',
        link: '',
      });
      expect(replaced.tags).toEqual(created.tags);
    });

    it('replaces tags when given', () => {
      const created = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ tags: [{ name: 'Thai' }] }),
      );

      const replaced = recipeService.replaceRecipe(
        db,
        'user-a',
        created.id,
        recipeInput({ tags: [{ name: 'Indian' }] }),
      );

      expect(replaced.tags.map((t) => t.name)).toEqual(['Indian']);
    });

    it('reports a recipe of another user as not found', () => {
      const theirs = recipeService.createRecipe(db, 'user-b', recipeInput());

      expect(() => recipeService.replaceRecipe(db, 'user-a', theirs.id, recipeInput())).toThrow(
        NotFoundError,
      );
    });
  });

  describe('deleteRecipe()', () => {
    it('deletes the recipe and its links but keeps tags', () => {
      const created = recipeService.createRecipe(
        db,
        'user-a',
        recipeInput({ tags: [{ name: 'Thai' }] }),
      );

      recipeService.deleteRecipe(db, 'user-a', created.id);

      expect(countRows()).toEqual({ recipes: 0, tags: 1, links: 0 });
    });

    it('reports a recipe of another user as not found and keeps it', () => {
      const theirs = recipeService.createRecipe(db, 'user-b', recipeInput());

      expect(() => recipeService.deleteRecipe(db, 'user-a', theirs.id)).toThrow(NotFoundError);
      expect(countRows().recipes).toBe(1);
    });
  });

  describe('attachRecipeImage()', () => {
    const user = { id: 'user-a', email: 'user-a@example.com' };
    const png = { contentType: 'image/png', data: Buffer.from('fake-png-bytes') };

    it('stores a generated reference and returns the labeler result', async () => {
      // Given: A recipe and a labeler that finds one label
      const created = recipeService.createRecipe(db, 'user-a', recipeInput());
      const labeler = new FakeLabeler({
        presignedUrl: 'https://bucket.example.test/user-a/signed',
        labels: [{ name: 'Food', confidence: 98.5 }],
      });

      // When: Attaching an image
      const result = await recipeService.attachRecipeImage(db, user, created.id, png, labeler);

      // Then: Reference stored, labeler called with the generated name
      expect(result.image).toMatch(/^uploads\/recipe\/[0-9a-f-]{36}\.png$/);
      expect(result.presignedUrl).toBe('https://bucket.example.test/user-a/signed');
      expect(result.labels).toEqual([{ name: 'Food', confidence: 98.5 }]);
      expect(recipeService.getRecipeDetail(db, 'user-a', created.id).image).toBe(result.image);

      expect(labeler.calls).toHaveLength(1);
      expect(labeler.calls[0]).toEqual({
        userEmail: 'user-a@example.com',
        filename: result.image.slice('uploads/recipe/'.length),
        contentType: 'image/png',
        data: png.data,
        recipeId: created.id,
      });
    });

    it('surfaces a labeler error as ImageAnalysisError', async () => {
      const created = recipeService.createRecipe(db, 'user-a', recipeInput());
      const labeler = new FakeLabeler({ error: 'Image storage credentials not available' });

      await expect(
        recipeService.attachRecipeImage(db, user, created.id, png, labeler),
      ).rejects.toThrow(new ImageAnalysisError('Image storage credentials not available'));
    });

    it('rejects non-image content without calling the labeler', async () => {
      const created = recipeService.createRecipe(db, 'user-a', recipeInput());
      const labeler = new FakeLabeler({ presignedUrl: 'unused', labels: [] });

      await expect(
        recipeService.attachRecipeImage(
          db,
          user,
          created.id,
          { contentType: 'text/plain', data: Buffer.from('hello') },
          labeler,
        ),
      ).rejects.toThrow(ValidationError);
      expect(labeler.calls).toHaveLength(0);
      expect(recipeService.getRecipeDetail(db, 'user-a', created.id).image).toBeNull();
    });

    it('rejects an empty file', async () => {
      const created = recipeService.createRecipe(db, 'user-a', recipeInput());
      const labeler = new FakeLabeler({ presignedUrl: 'unused', labels: [] });

      await expect(
        recipeService.attachRecipeImage(
          db,
          user,
          created.id,
          { contentType: 'image/jpeg', data: Buffer.alloc(0) },
          labeler,
        ),
      ).rejects.toThrow('The submitted image file is empty');
    });

    it('reports a recipe of another user as not found', async () => {
      const theirs = recipeService.createRecipe(db, 'user-b', recipeInput());
      const labeler = new FakeLabeler({ presignedUrl: 'unused', labels: [] });

      await expect(
        recipeService.attachRecipeImage(db, user, theirs.id, png, labeler),
      ).rejects.toThrow(NotFoundError);
      expect(labeler.calls).toHaveLength(0);
    });
  });
});
