/**
 * Script to make a user an admin
 * Usage: npm run make-admin -- <email>
 * Example: npm run make-admin -- moderator@example.com
 */

import mongoose from 'mongoose'
import User from '../src/models/users'
import { connectDatabase, isDatabaseConnected } from '../src/config/database'

async function makeAdmin(email: string) {
  try {
    console.log('🔌 Connecting to database...')
    await connectDatabase()
    if (!isDatabaseConnected()) {
      console.error('❌ Could not connect to MongoDB. Check MONGODB_URI.')
      process.exitCode = 1
      return
    }

    const normalizedEmail = email.toLowerCase().trim()
    console.log(`🔍 Looking for user with email: ${normalizedEmail}`)

    const user = await User.findOne({ email: normalizedEmail })

    if (!user) {
      console.error(`❌ User with email ${normalizedEmail} not found in database.`)
      console.log('💡 Make sure the user has signed in at least once to create their account.')
      process.exitCode = 1
      return
    }

    console.log(`✅ Found user: ${user.full_name || user.email}`)
    console.log(`   Current role: ${user.role || 'user'}`)
    console.log(`   Clerk ID: ${user.clerk_id}`)

    user.role = 'admin'
    await user.save()

    console.log(`\n🎉 Success! User ${normalizedEmail} is now an admin.`)
  } catch (error) {
    console.error('❌ Error making user admin:', error)
    process.exitCode = 1
  } finally {
    await mongoose.disconnect()
    console.log('🔌 Disconnected from database')
  }
}

const email = process.argv[2]

if (!email) {
  console.error('❌ Please provide an email address.')
  console.log('Usage: npm run make-admin -- <email>')
  process.exit(1)
}

void makeAdmin(email)
