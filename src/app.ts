import express from 'express';

import evaluateRouter from './routes/evaluate';
import resultRouter from './routes/result';

const app = express();
app.use(express.json({ limit: '10mb' }));
app.use(express.urlencoded({ extended: true }));

app.use('/evaluate', evaluateRouter);
app.use('/result', resultRouter);

export default app;
