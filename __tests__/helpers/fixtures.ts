import type { Product, User } from '../../src/connections/db/models';
import { PRODUCT_CATEGORY, USER_ROLE, type ProductCategory, type UserRole } from '../../src/constants';
import type { Actor } from '../../src/types/request.types';
import type { InMemoryDatabase } from './in-memory-database';

export const actorOf = (user: User): Actor => ({ id: user.id, username: user.username, role: user.role });

export const seedUser = (
  db: InMemoryDatabase,
  username: string,
  role: UserRole = USER_ROLE.CUSTOMER,
  passwordHash = 'not-a-real-hash'
): Promise<User> =>
  db.transaction(({ users }) =>
    users.create({
      username,
      email: `${username}@example.com`,
      password_hash: passwordHash,
      role,
    })
  );

export const seedProduct = (
  db: InMemoryDatabase,
  name: string,
  price: number,
  category: ProductCategory = PRODUCT_CATEGORY.FOOD,
  is_available = true
): Promise<Product> =>
  db.transaction(({ products }) => products.create({ name, price, category, is_available }));

export interface Crew {
  admin: Actor;
  staff: Actor;
  alice: Actor;
  bob: Actor;
}

export const seedCrew = async (db: InMemoryDatabase): Promise<Crew> => ({
  admin: actorOf(await seedUser(db, 'admin', USER_ROLE.ADMIN)),
  staff: actorOf(await seedUser(db, 'staff', USER_ROLE.STAFF)),
  alice: actorOf(await seedUser(db, 'alice')),
  bob: actorOf(await seedUser(db, 'bob')),
});
