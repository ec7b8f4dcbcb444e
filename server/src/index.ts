import { API_HOST, API_PORT, DATA_FILE } from '../../src/config.js';
import { createRepo } from '../../src/db/repo.js';
import { createJsonStore } from '../../src/db/store.js';
import { createApp } from './app.js';

const repo = createRepo(createJsonStore(DATA_FILE));
const app = createApp(repo);

app.listen(API_PORT, API_HOST, () => {
  console.log(`Ledger API running on http://${API_HOST}:${API_PORT} (store: ${DATA_FILE})`);
});
