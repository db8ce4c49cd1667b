import { MemoryLastVisitStorage } from './memoryStorage';

export const ALICE_KEY = 'test-key-alice';
export const BOB_KEY = 'test-key-bob';

/**
 * Alice (1) is reporter of 10, on the CC of 11, assignee of private 14.
 * 12 is public but Alice has no role on it; 13 is private to Bob.
 */
export function seededStorage(): MemoryLastVisitStorage {
  const storage = new MemoryLastVisitStorage();
  storage.addUser(1, 'alice@example.test', ALICE_KEY);
  storage.addUser(2, 'bob@example.test', BOB_KEY);
  storage.addUser(3, 'carol@example.test');

  storage.addBug({ id: 10, reporter: 1 });
  storage.addBug({ id: 11, reporter: 2, cc: [1] });
  storage.addBug({ id: 12, reporter: 2 });
  storage.addBug({ id: 13, reporter: 2, isPrivate: true });
  storage.addBug({ id: 14, reporter: 3, assignedTo: 1, alias: 'login-crash', isPrivate: true });
  return storage;
}
