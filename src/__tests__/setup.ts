process.env.FONT_REPORT_LOG_LEVEL = 'silent';
