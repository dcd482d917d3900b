/**
 * History Store Tests
 */

import {
  InMemoryHistoryStore,
  MAX_HISTORY_LIMIT,
  clampHistoryLimit,
  findAutofillSource,
  rankSubmissions,
  type HistoryStore,
  type SubmissionRecord,
} from '@tradeform/shared';
import { failingEmbeddings, vocabularyEmbeddings } from './helpers';

const VOCABULARY = ['cotton', 'shirts', 'headphones', 'laptops'];
const INVOICE = 'commercial_invoice.json';

async function seed(store: InMemoryHistoryStore): Promise<SubmissionRecord[]> {
  const records: SubmissionRecord[] = [];
  for (const inputText of ['cotton shirts from Dhaka', 'headphones order', 'cotton shirts and laptops']) {
    records.push(await store.save({ templateName: INVOICE, inputText, filledForm: { note: inputText } }));
  }
  return records;
}

describe('InMemoryHistoryStore', () => {
  it('assigns an id, a timestamp and the input embedding on save', async () => {
    const { provider } = vocabularyEmbeddings(VOCABULARY);
    const store = new InMemoryHistoryStore(provider, 1000);

    const record = await store.save({ templateName: INVOICE, inputText: 'cotton shirts', filledForm: { a: '1' } });

    expect(record.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(Number.isNaN(Date.parse(record.createdAt))).toBe(false);
    expect(record.embedding).toEqual([1, 1, 0, 0]);
    expect(store.size).toBe(1);
  });

  it('orders by descending embedding similarity', async () => {
    const { provider } = vocabularyEmbeddings(VOCABULARY);
    const store = new InMemoryHistoryStore(provider, 1000);
    const [dhaka, headphones, laptops] = await seed(store);

    const results = await store.findSimilar('cotton shirts', 10);

    expect(results.map((r) => r.id)).toEqual([dhaka.id, laptops.id, headphones.id]);
  });

  it('returns at most limit records', async () => {
    const { provider } = vocabularyEmbeddings(VOCABULARY);
    const store = new InMemoryHistoryStore(provider, 1000);
    const [dhaka, , laptops] = await seed(store);

    const results = await store.findSimilar('cotton shirts', 2);

    expect(results.map((r) => r.id)).toEqual([dhaka.id, laptops.id]);
  });

  it('returns the most recent records for a blank query', async () => {
    const store = new InMemoryHistoryStore();
    const [first, second, third] = await seed(store);

    expect((await store.findSimilar('  ', 10)).map((r) => r.id)).toEqual([third.id, second.id, first.id]);
  });

  it('filters by template', async () => {
    const store = new InMemoryHistoryStore();
    await seed(store);
    const packing = await store.save({ templateName: 'packing_list.json', inputText: 'cotton shirts', filledForm: {} });

    const invoiceOnly = await store.findSimilar('cotton shirts', 10, INVOICE);
    const packingOnly = await store.findSimilar('cotton shirts', 10, 'packing_list.json');

    expect(invoiceOnly.every((r) => r.templateName === INVOICE)).toBe(true);
    expect(invoiceOnly).toHaveLength(3);
    expect(packingOnly.map((r) => r.id)).toEqual([packing.id]);
  });

  it('saves without an embedding and ranks by keywords when the provider fails', async () => {
    const { provider } = failingEmbeddings();
    const store = new InMemoryHistoryStore(provider, 1000);
    const [dhaka, headphones, laptops] = await seed(store);

    expect(dhaka.embedding).toBeNull();

    const results = await store.findSimilar('cotton shirts', 10);
    expect(results.map((r) => r.id)).toEqual([dhaka.id, laptops.id, headphones.id]);
  });

  it('keeps stored forms independent of the caller', async () => {
    const store = new InMemoryHistoryStore();
    const form = { consignee: 'Beta GmbH' };
    await store.save({ templateName: INVOICE, inputText: 'x', filledForm: form });
    form.consignee = 'changed';

    const [record] = await store.findSimilar('', 1);
    expect(record.filledForm).toEqual({ consignee: 'Beta GmbH' });
  });
});

describe('rankSubmissions', () => {
  const record = (id: string, inputText: string, embedding: number[] | null): SubmissionRecord => ({
    id,
    templateName: INVOICE,
    inputText,
    filledForm: {},
    createdAt: '2025-01-01T00:00:00.000Z',
    embedding,
  });

  it('scores records without an embedding as 0', () => {
    const records = [record('a', 'cotton', null), record('b', 'tea', [0, 1]), record('c', 'cotton', [1, 0])];

    expect(rankSubmissions(records, 'cotton', [1, 0], 3).map((r) => r.id)).toEqual(['c', 'a', 'b']);
  });
});

describe('clampHistoryLimit', () => {
  it('clamps to [1, 100]', () => {
    expect(clampHistoryLimit(0)).toBe(1);
    expect(clampHistoryLimit(-5)).toBe(1);
    expect(clampHistoryLimit(7.9)).toBe(7);
    expect(clampHistoryLimit(5000)).toBe(MAX_HISTORY_LIMIT);
  });
});

describe('findAutofillSource', () => {
  it('returns the most similar record for the template', async () => {
    const { provider } = vocabularyEmbeddings(VOCABULARY);
    const store = new InMemoryHistoryStore(provider, 1000);
    const [, headphones] = await seed(store);

    const source = await findAutofillSource(store, 'headphones', INVOICE);

    expect(source?.id).toBe(headphones.id);
  });

  it('returns null when the template has no history', async () => {
    const store = new InMemoryHistoryStore();
    await seed(store);

    expect(await findAutofillSource(store, 'cotton', 'bill_of_lading.json')).toBeNull();
  });

  it('returns null when the store cannot be searched', async () => {
    const store: HistoryStore = {
      kind: 'broken',
      save: jest.fn(),
      findSimilar: jest.fn().mockRejectedValue(new Error('connection refused')),
      ping: jest.fn().mockResolvedValue(false),
      close: jest.fn(),
    };

    expect(await findAutofillSource(store, 'cotton', INVOICE)).toBeNull();
  });
});
