import multer from 'multer';

export const MAX_UPLOAD_SIZE = 10 * 1024 * 1024; // 10MB

// Resumes are parsed straight from memory and never written to disk
export const resumeUpload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_UPLOAD_SIZE, files: 1 },
}).single('resume');
