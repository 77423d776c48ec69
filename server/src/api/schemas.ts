import { z } from 'zod';

const id = z.coerce.number().int().positive();
const name = z.string().trim().min(1).max(255);
const quantity = z.number().int().positive();
const version = z.number().int().positive();

export const listParamsSchema = z.object({
  listId: id
});

export const itemParamsSchema = z.object({
  listId: id,
  itemId: id
});

export const createListSchema = z.object({
  name
});

export const createItemSchema = z.object({
  name,
  quantity
});

export const updateItemSchema = z.object({
  name,
  quantity,
  version
});

export const toggleItemSchema = z.object({
  version
});
