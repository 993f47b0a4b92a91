process.env.LOG_LEVEL = 'silent';
delete process.env.LOG_FILE;
delete process.env.VLESS2JSON_STRICT;
delete process.env.VLESS2JSON_PRESET;
delete process.env.VLESS2JSON_OUTPUT;

export {};
