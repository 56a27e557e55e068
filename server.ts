import path from 'node:path';
import { createApp } from './app.js';

const PORT = Number(process.env.PORT ?? 3000);
const PUBLIC_DIR = path.resolve(process.env.PUBLIC_DIR ?? 'public');

createApp(PUBLIC_DIR).listen(PORT, () => {
  // eslint-disable-next-line no-console
  console.log(`Server started on http://localhost:${PORT}`);
});
