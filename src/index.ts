import app from './app';
import { getConfig } from './config';

const { port } = getConfig();

app.listen(port, () => {
  console.log(`Server listening on port ${port}`);
});

export default app;
