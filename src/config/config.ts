// src/config/config.ts
import dotenv from "dotenv";

dotenv.config();

const config = Object.freeze({
  appName: process.env.APP_NAME || "Grade Generator",
  csvFile: process.env.GRADES_CSV || "grades.csv",
  archiveDir: process.env.ARCHIVE_DIR || "./archive",
  archiveLog: process.env.ARCHIVE_LOG || "organizer.log",
});

export default config;
