import dotenv from 'dotenv';

// Imported first by the entrypoint so every module sees the .env values.
// Variables already present in the process environment win over the file.
dotenv.config();
