import 'dotenv/config';
import { app } from './app';
import { loadServerConfig } from './utils/config/config';

const { port } = loadServerConfig();

// Start server
app.listen(port, () => {
  console.log(`Server is running on port ${port}`);
});
