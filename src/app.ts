import express from 'express';
import cors, { CorsOptions } from 'cors';
import { pool } from './connections';
import { appConfig } from './connections/config/app.config';
import routes from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import { getUploadRoot } from './modules/upload/localStorage.service';
import { logger, errorMessage } from './utils/logging';

const app = express();

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
];

// CORS Configuration
const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Requests without an origin (curl, server-to-server)
    if (!origin) {
      return callback(null, true);
    }

    const allowedOrigins = [
      ...(appConfig.frontendUrl ? [appConfig.frontendUrl] : []),
      ...appConfig.corsOrigins,
      ...(appConfig.nodeEnv === 'development' ? DEV_ORIGINS : []),
    ];

    if (allowedOrigins.includes(origin)) {
      callback(null, true);
    } else if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      callback(null, true);
    } else {
      callback(new Error('Not allowed by CORS'));
    }
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
  exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
  maxAge: 86400,
  optionsSuccessStatus: 200,
};

// Middleware
app.use(cors(corsOptions));
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// Health check
app.get('/health', async (_req, res) => {
  try {
    await pool.query('SELECT 1');
    res.json({ status: 'ok', database: 'connected' });
  } catch (error) {
    logger.error('Health check failed', { error: errorMessage(error) });
    res.status(500).json({ status: 'error', database: 'disconnected' });
  }
});

// Stored documents and reward images
app.use('/uploads', express.static(getUploadRoot()));

// API Routes
app.use('/api', routes);

// Error handling
app.use(notFoundHandler);
app.use(errorHandler);

export default app;
