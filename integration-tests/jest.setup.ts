// Keep test output readable; set LOG_LEVEL=debug to see pipeline logs
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
