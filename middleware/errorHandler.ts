import { ErrorRequestHandler, RequestHandler } from 'express';
import mongoose from 'mongoose';
import { AppError } from '../utils/errors';

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ message: `Route ${req.method} ${req.path} not found` });
};

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      console.error(`${req.method} ${req.originalUrl} error:`, err, err.cause);
    }
    res.status(err.statusCode).json({ message: err.message, code: err.code });
    return;
  }

  if (err instanceof mongoose.Error.CastError) {
    res.status(400).json({ message: 'Invalid id', code: 'INVALID_ARGUMENT' });
    return;
  }

  // express.json() rejects unparsable bodies with a SyntaxError carrying status 400
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json({ message: 'Malformed JSON body', code: 'INVALID_ARGUMENT' });
    return;
  }

  console.error(`${req.method} ${req.originalUrl} error:`, err);
  res.status(500).json({ message: 'Server error' });
};
