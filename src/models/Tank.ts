/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * En akvarieprofil
 */
export interface Tank {
  id: number;
  name: string;
  volumeL: number | null; // liter, null om okänd
  notes: string;
  createdAt: string;
  updatedAt: string;
}
