/**
 * Demo data seed.
 *
 * Writes customers, providers, offerings and addresses straight into the
 * JSON store configured by DATA_FILE, then prints a bearer token per account.
 *
 * Usage:
 *   DATA_FILE=data/marketplace.json npm run seed
 */

import { db } from '../src/shared/database/db';
import { signCallerToken } from '../src/shared/middleware/auth.middleware';
import { CallerRole } from '../src/core/constants';
import { logger } from '../src/shared/services/logger.service';

const CUSTOMER_COUNT = 5;
const PROVIDER_COUNT = 8;

// Downtown reference point; everyone lands within ~25 km of it
const CENTER = { latitude: 40.7128, longitude: -74.006 };

function jitter(spreadDegrees: number): number {
  return (Math.random() * 2 - 1) * spreadDegrees;
}

function pick<T>(items: readonly T[], count: number): T[] {
  return [...items].sort(() => Math.random() - 0.5).slice(0, count);
}

function run(): void {
  const categories = db.listCategories();
  const tokens: string[] = [];

  for (let i = 1; i <= CUSTOMER_COUNT; i++) {
    const customer = db.createCustomer({ name: `Customer ${i}`, email: `customer${i}@example.com` });
    db.createAddress({
      ownerId: customer.id,
      ownerRole: CallerRole.CUSTOMER,
      line: `${100 + i} Main Street`,
      city: 'Springfield',
      state: 'NY',
      postalCode: `1000${i}`,
      location: { latitude: CENTER.latitude + jitter(0.1), longitude: CENTER.longitude + jitter(0.1) }
    });
    tokens.push(`customer  ${customer.email.padEnd(26)} ${signCallerToken({ role: CallerRole.CUSTOMER, id: customer.id }, '30d')}`);
  }

  for (let i = 1; i <= PROVIDER_COUNT; i++) {
    const provider = db.createProvider({
      name: `Provider ${i}`,
      email: `provider${i}@example.com`,
      experienceYears: Math.floor(Math.random() * 20) + 1,
      isAvailable: Math.random() > 0.2,
      isVerified: true
    });
    db.createAddress({
      ownerId: provider.id,
      ownerRole: CallerRole.PROVIDER,
      line: `${200 + i} Market Street`,
      city: 'Springfield',
      state: 'NY',
      postalCode: `2000${i}`,
      location: { latitude: CENTER.latitude + jitter(0.2), longitude: CENTER.longitude + jitter(0.2) }
    });

    for (const category of pick(categories, 1 + Math.floor(Math.random() * 3))) {
      const priceRate = Math.round((40 + Math.random() * 110) * 100) / 100;
      db.createOffering(provider.id, category.id, priceRate);
    }
    tokens.push(`provider  ${provider.email.padEnd(26)} ${signCallerToken({ role: CallerRole.PROVIDER, id: provider.id }, '30d')}`);
  }

  db.flush();

  logger.info('Seed complete', db.getStats());
  console.log('\nBearer tokens (valid 30 days):');
  tokens.forEach(line => console.log(`  ${line}`));
}

run();
