import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { RecipeBook } from '../../src/recipes/recipe-book.js';
import type { SQLiteDatabaseAdapter } from '../../src/persistence/sqlite-adapter.js';
import type { RecipeCreateInput } from '../../src/recipes/types.js';
import { START, createClock, flourAndSugar, openTestBook, openTestDatabase, type TestClock } from './fixtures.js';

describe('RecipeStore', () => {
  let db: SQLiteDatabaseAdapter;
  let clock: TestClock;
  let book: RecipeBook;

  async function create(title: string, extra: Partial<RecipeCreateInput> = {}): Promise<number> {
    const result = await book.createRecipe({
      title,
      instructions: 'Mix and bake.',
      prepTime: 30,
      author: 'bob',
      ingredients: flourAndSugar,
      ...extra,
    });
    return result.id;
  }

  async function recipeCountOf(username: string): Promise<number | undefined> {
    return (await book.credentials.getUser(username))?.recipeCount;
  }

  async function categoryCountOf(id: number): Promise<number | undefined> {
    return (await book.categories.getCategory(id))?.recipeCount;
  }

  beforeEach(async () => {
    db = await openTestDatabase();
    clock = createClock();
    book = await openTestBook(clock, { db });
    await book.register('bob', 'secret1');
    await book.register('alice', 'secret2');
  });

  afterEach(async () => {
    await book.close();
  });

  describe('create', () => {
    it('should store a recipe with its categories and ingredients', async () => {
      const dessert = await book.addCategory('Dessert');
      const result = await book.createRecipe({
        title: 'Cake',
        instructions: 'Mix and bake.',
        prepTime: 45,
        author: 'bob',
        categoryIds: [dessert],
        ingredients: flourAndSugar,
      });

      expect(dessert).toBe(1);
      expect(result).toEqual({ id: 1, skippedCategories: [], skippedIngredients: [] });

      const detail = await book.getRecipe(result.id);
      expect(detail?.recipe).toEqual({
        id: 1,
        title: 'Cake',
        instructions: 'Mix and bake.',
        prepTime: 45,
        views: 0,
        createdBy: 'bob',
        createdAt: START,
        updatedAt: null,
        status: 'active',
      });
      expect(detail?.categories).toEqual([{ id: 1, name: 'Dessert' }]);
      expect(detail?.ingredients.map(i => [i.name, i.quantity])).toEqual([
        ['flour', '2 cups'],
        ['sugar', '1 cup'],
      ]);
      expect(await recipeCountOf('bob')).toBe(1);
      expect(await categoryCountOf(1)).toBe(1);
    });

    it('should skip bad categories and ingredients and report them', async () => {
      const dessert = await book.addCategory('Dessert');
      const result = await book.createRecipe({
        title: 'Cake',
        instructions: 'Mix and bake.',
        prepTime: '45',
        author: 'bob',
        categoryIds: [dessert, 99, 'abc', dessert],
        ingredients: [
          { name: 'flour', quantity: '2 cups' },
          { name: '  ', quantity: '1 cup' },
        ],
      });

      expect(result.skippedCategories).toEqual([
        { categoryId: 99, reason: 'not_found' },
        { categoryId: 'abc', reason: 'invalid' },
        { categoryId: 1, reason: 'duplicate' },
      ]);
      expect(result.skippedIngredients).toEqual([
        { name: '', quantity: '1 cup', reason: 'Ingredient name cannot be empty' },
      ]);

      const detail = await book.getRecipe(result.id);
      expect(detail?.categories).toEqual([{ id: 1, name: 'Dessert' }]);
      expect(detail?.ingredients.map(i => i.name)).toEqual(['flour']);
      expect(await categoryCountOf(dessert)).toBe(1);
    });

    it('should accept category ids given as text', async () => {
      await book.addCategory('Dessert');
      const id = await create('Cake', { categoryIds: [' 1 '] });

      expect((await book.getRecipe(id))?.categories).toEqual([{ id: 1, name: 'Dessert' }]);
    });

    it('should roll everything back when no ingredient is valid', async () => {
      const dessert = await book.addCategory('Dessert');

      await expect(create('Cake', {
        categoryIds: [dessert],
        ingredients: [{ name: '' }, { name: 'x'.repeat(101) }],
      })).rejects.toMatchObject({
        code: 'INGREDIENTS_REQUIRED',
        message: 'At least one ingredient is required',
      });

      expect(await book.getRecipe(1)).toBeNull();
      expect(await book.listActiveRecipes()).toEqual([]);
      expect(await recipeCountOf('bob')).toBe(0);
      expect(await categoryCountOf(dessert)).toBe(0);
      expect(await book.activity.listEvents()).toEqual([]);
    });

    it('should keep a failing create invisible to concurrent reads', async () => {
      const state = { settled: false };
      const creating = create('Ghost', { ingredients: [{ name: '' }] });
      const settle = (): void => {
        state.settled = true;
      };
      void creating.then(settle, settle);

      const dirty: Array<[boolean, number | undefined]> = [];
      do {
        const visible = (await book.getRecipe(1)) !== null;
        const count = await recipeCountOf('bob');
        if (visible || count !== 0) {
          dirty.push([visible, count]);
        }
      } while (!state.settled);

      await expect(creating).rejects.toMatchObject({ code: 'INGREDIENTS_REQUIRED' });
      expect(dirty).toEqual([]);
      expect(await book.activity.listEvents()).toEqual([]);
    });

    it('should require ingredients when none are given', async () => {
      await expect(create('Cake', { ingredients: undefined })).rejects.toMatchObject({
        code: 'INGREDIENTS_REQUIRED',
      });
    });

    it('should validate fields before writing', async () => {
      await expect(create('  ')).rejects.toMatchObject({ code: 'TITLE_INVALID' });
      await expect(create('Cake', { instructions: '' })).rejects.toMatchObject({ code: 'INSTRUCTIONS_INVALID' });
      await expect(create('Cake', { prepTime: '0' })).rejects.toMatchObject({ code: 'PREP_TIME_INVALID' });
      await expect(create('Cake', { author: 'b' })).rejects.toMatchObject({ code: 'USERNAME_INVALID' });

      expect(await book.listActiveRecipes()).toEqual([]);
    });

    it('should append a create event for the author', async () => {
      const id = await create('Cake');

      const events = await book.activity.listEvents({ recipeId: id });
      expect(events).toEqual([{ id: 1, recipeId: id, username: 'bob', type: 'create', time: START }]);
    });
  });

  describe('update', () => {
    it('should rewrite fields and replace categories and ingredients', async () => {
      const dessert = await book.addCategory('Dessert');
      const soup = await book.addCategory('Soup');
      const id = await create('Cake', { categoryIds: [dessert] });
      clock.advance(1000);

      const result = await book.updateRecipe(id, {
        title: 'Chocolate Cake',
        instructions: 'Melt, mix, bake.',
        prepTime: '50',
        categoryIds: [soup],
        ingredients: [{ name: 'cocoa', quantity: '3 tbsp' }],
      }, 'alice');

      expect(result).toEqual({ updated: true, skippedCategories: [], skippedIngredients: [] });

      const detail = await book.getRecipe(id);
      expect(detail?.recipe.title).toBe('Chocolate Cake');
      expect(detail?.recipe.instructions).toBe('Melt, mix, bake.');
      expect(detail?.recipe.prepTime).toBe(50);
      expect(detail?.recipe.updatedAt).toBe(START + 1000);
      expect(detail?.categories).toEqual([{ id: soup, name: 'Soup' }]);
      expect(detail?.ingredients.map(i => [i.name, i.quantity])).toEqual([['cocoa', '3 tbsp']]);
      expect(await categoryCountOf(dessert)).toBe(0);
      expect(await categoryCountOf(soup)).toBe(1);

      const events = await book.activity.listEvents({ recipeId: id });
      expect(events.map(e => [e.type, e.username])).toEqual([
        ['edit', 'alice'],
        ['create', 'bob'],
      ]);
    });

    it('should leave categories and ingredients alone when omitted', async () => {
      const dessert = await book.addCategory('Dessert');
      const id = await create('Cake', { categoryIds: [dessert] });

      await book.updateRecipe(id, { title: 'Cake v2', instructions: 'Bake.', prepTime: 35 });

      const detail = await book.getRecipe(id);
      expect(detail?.recipe.title).toBe('Cake v2');
      expect(detail?.categories).toEqual([{ id: dessert, name: 'Dessert' }]);
      expect(detail?.ingredients.map(i => i.name)).toEqual(['flour', 'sugar']);
      expect(await categoryCountOf(dessert)).toBe(1);

      const [latest] = await book.activity.listEvents({ recipeId: id, type: 'edit' });
      expect(latest.username).toBe('bob');
    });

    it('should unlink every category for an empty list', async () => {
      const dessert = await book.addCategory('Dessert');
      const id = await create('Cake', { categoryIds: [dessert] });

      await book.updateRecipe(id, { title: 'Cake', instructions: 'Bake.', prepTime: 30, categoryIds: [] });

      expect((await book.getRecipe(id))?.categories).toEqual([]);
      expect(await categoryCountOf(dessert)).toBe(0);
    });

    it('should roll back when every replacement ingredient is invalid', async () => {
      const dessert = await book.addCategory('Dessert');
      const id = await create('Cake', { categoryIds: [dessert] });

      await expect(book.updateRecipe(id, {
        title: 'Broken',
        instructions: 'Bake.',
        prepTime: 30,
        categoryIds: [],
        ingredients: [{ name: ' ' }],
      })).rejects.toMatchObject({ code: 'INGREDIENTS_REQUIRED' });

      const detail = await book.getRecipe(id);
      expect(detail?.recipe.title).toBe('Cake');
      expect(detail?.categories).toEqual([{ id: dessert, name: 'Dessert' }]);
      expect(detail?.ingredients.map(i => i.name)).toEqual(['flour', 'sugar']);
      expect(await categoryCountOf(dessert)).toBe(1);
    });

    it('should report skipped items', async () => {
      const id = await create('Cake');

      const result = await book.updateRecipe(id, {
        title: 'Cake',
        instructions: 'Bake.',
        prepTime: 30,
        categoryIds: [7],
        ingredients: [{ name: 'flour', quantity: '2 cups' }, { name: 'salt', quantity: 'q'.repeat(51) }],
      });

      expect(result).toEqual({
        updated: true,
        skippedCategories: [{ categoryId: 7, reason: 'not_found' }],
        skippedIngredients: [{
          name: 'salt',
          quantity: 'q'.repeat(51),
          reason: 'Quantity description is too long (maximum 50 characters)',
        }],
      });
    });

    it('should not update a missing or deleted recipe', async () => {
      const id = await create('Cake');
      await book.softDeleteRecipe(id, 'bob');

      const input = { title: 'Cake', instructions: 'Bake.', prepTime: 30 };
      expect(await book.updateRecipe(id, input)).toEqual({ updated: false });
      expect(await book.updateRecipe(404, input)).toEqual({ updated: false });
    });

    it('should validate fields before writing', async () => {
      const id = await create('Cake');

      await expect(book.updateRecipe(id, { title: '', instructions: 'Bake.', prepTime: 30 }))
        .rejects.toMatchObject({ code: 'TITLE_INVALID' });
      await expect(book.updateRecipe(id, { title: 'Cake', instructions: 'Bake.', prepTime: 2000 }))
        .rejects.toMatchObject({ code: 'PREP_TIME_INVALID' });
    });
  });

  describe('softDelete', () => {
    it('should hide the recipe and fix the counters', async () => {
      const dessert = await book.addCategory('Dessert');
      const id = await create('Cake', { categoryIds: [dessert] });
      const other = await create('Pie');
      await book.recordView(id, 'alice');

      expect(await book.softDeleteRecipe(id, 'alice')).toBe(true);

      expect(await book.getRecipe(id)).toBeNull();
      expect((await book.listActiveRecipes()).map(r => r.id)).toEqual([other]);
      expect(await recipeCountOf('bob')).toBe(1);
      expect(await categoryCountOf(dessert)).toBe(0);
      expect(await book.activity.getUserView('alice', id)).toBeNull();

      const deletes = await book.activity.listEvents({ recipeId: id, type: 'delete' });
      expect(deletes.map(e => e.username)).toEqual(['alice']);
    });

    it('should keep ingredients and links in storage', async () => {
      const dessert = await book.addCategory('Dessert');
      const id = await create('Cake', { categoryIds: [dessert] });

      await book.softDeleteRecipe(id, 'bob');

      const ingredients = await db.query('SELECT id FROM recipe_ingredients WHERE recipe_id = ?', [id]);
      const links = await db.query('SELECT category_id FROM recipe_categories WHERE recipe_id = ?', [id]);
      expect(ingredients.rowCount).toBe(2);
      expect(links.rowCount).toBe(1);
    });

    it('should fail for an already deleted or missing recipe', async () => {
      const id = await create('Cake');

      expect(await book.softDeleteRecipe(id, 'bob')).toBe(true);
      expect(await book.softDeleteRecipe(id, 'bob')).toBe(false);
      expect(await book.softDeleteRecipe(404, 'bob')).toBe(false);
      expect(await recipeCountOf('bob')).toBe(0);
    });
  });

  describe('lists', () => {
    it('should list active recipes newest first', async () => {
      await create('First');
      clock.advance(1000);
      await create('Second');
      clock.advance(1000);
      const third = await create('Third');
      await book.softDeleteRecipe(third, 'bob');

      expect((await book.listActiveRecipes()).map(r => r.title)).toEqual(['Second', 'First']);
    });

    it('should break created_at ties by id', async () => {
      await create('First');
      await create('Second');

      expect((await book.recentRecipes()).map(r => r.title)).toEqual(['Second', 'First']);
    });

    it('should limit recent recipes', async () => {
      for (const title of ['A', 'B', 'C']) {
        await create(title);
        clock.advance(1000);
      }

      expect((await book.recentRecipes(2)).map(r => r.title)).toEqual(['C', 'B']);
    });

    it('should order most viewed recipes by views', async () => {
      const a = await create('A');
      await create('B');
      const c = await create('C');
      await book.recordView(a, 'alice');
      await book.recordView(a, 'bob');
      await book.recordView(c, 'alice');

      expect((await book.mostViewedRecipes()).map(r => [r.title, r.views])).toEqual([
        ['A', 2],
        ['C', 1],
        ['B', 0],
      ]);
    });

    it('should filter by category', async () => {
      const dessert = await book.addCategory('Dessert');
      const soup = await book.addCategory('Soup');
      await create('Cake', { categoryIds: [dessert] });
      clock.advance(1000);
      const stew = await create('Stew', { categoryIds: [soup] });
      clock.advance(1000);
      await create('Pie', { categoryIds: [dessert] });
      await book.softDeleteRecipe(stew, 'bob');

      expect((await book.recipesByCategory(dessert)).map(r => r.title)).toEqual(['Pie', 'Cake']);
      expect(await book.recipesByCategory(soup)).toEqual([]);
      expect((await book.recipesByCategory()).map(r => r.title)).toEqual(['Pie', 'Cake']);
      expect((await book.recipesByCategory(null)).map(r => r.title)).toEqual(['Pie', 'Cake']);
    });

    it('should return empty lists when storage fails', async () => {
      await create('Cake');
      await db.disconnect();

      expect(await book.listActiveRecipes()).toEqual([]);
      expect(await book.getRecipe(1)).toBeNull();
    });
  });
});

describe('RecipeStore list limits', () => {
  it('should cap lists at the configured limit', async () => {
    const clock = createClock();
    const book = await openTestBook(clock, { queries: { listLimit: 2, recentLimit: 1 } });
    for (const title of ['A', 'B', 'C']) {
      await book.createRecipe({ title, instructions: 'Mix.', prepTime: 5, author: 'bob', ingredients: flourAndSugar });
      clock.advance(1000);
    }

    expect((await book.listActiveRecipes()).map(r => r.title)).toEqual(['C', 'B']);
    expect((await book.recentRecipes()).map(r => r.title)).toEqual(['C']);
    expect(await book.recipesByCategory()).toHaveLength(2);

    await book.close();
  });
});
