import { clearMemoryStores } from '@/lib/stores';

beforeEach(() => {
  clearMemoryStores();
});
