import mongoose from "mongoose";

import { configEnv } from "./config";

const connectDB = async (url = configEnv.MONGODB_URL) => {
  try {
    mongoose.connection.on("connected", () => {
      console.log("MongoDB connected successfully");
    });

    mongoose.connection.on("error", (err) => {
      console.error("MongoDB connection error:", err);
    });

    await mongoose.connect(url);
  } catch (error) {
    console.error("MongoDB connection failed:", error);
    process.exit(1);
  }
};

export const disconnectDB = () => mongoose.disconnect();

export default connectDB;
