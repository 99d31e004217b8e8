import { Express } from 'express';
import request from 'supertest';
import { createApp } from '../../src/app';
import { Services } from '../../src/services/container';
import { createTestServices, TestServicesOptions } from '../helpers/services';

export const asAdmin = { 'X-Actor-Id': 'admin-1', 'X-Actor-Role': 'admin' };
export const asCustomer = (id = 'user-1') => ({ 'X-Actor-Id': id, 'X-Actor-Role': 'customer' });

export interface TestApi {
  app: Express;
  services: Services;
}

export function createTestApi(options: TestServicesOptions = {}): TestApi {
  const services = createTestServices(options);
  return { app: createApp(services), services };
}

// Category plus one product created over HTTP
export async function createCatalog(app: Express, stock = 10): Promise<{ categoryId: string; productId: string }> {
  const category = await request(app)
    .post('/api/categories')
    .set(asAdmin)
    .send({ name: 'Beverages', shortDescription: 'Drinks' })
    .expect(201);

  const product = await request(app)
    .post('/api/products')
    .set(asAdmin)
    .send({
      categoryId: category.body.data.id,
      name: 'Cold Brew',
      description: 'Slow steeped coffee',
      price: 4.5,
      stock,
    })
    .expect(201);

  return { categoryId: category.body.data.id, productId: product.body.data.product.id };
}
