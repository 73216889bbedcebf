// Imported first by the stdio entry: stdout carries the protocol, so logs go to stderr.
process.env.LOG_STREAM = 'stderr';
