import type { Catalog } from "./quizTypes";

export const UAE_HISTORY: Catalog = {
  title: "United Arab Emirates - History Quiz",
  topic: "UAE history",
  questions: [
    {
      prompt: "When is the United Arab Emirates National Day celebrated (the date the union was founded)?",
      options: { A: "January 1, 1971", B: "June 18, 1971", C: "December 2, 1971", D: "February 7, 1972" },
      correctKey: "C",
      explanation: "The UAE was formed on December 2, 1971. This date is celebrated as National Day.",
    },
    {
      prompt: "Who is widely recognized as the 'Founding Father' of the UAE?",
      options: {
        A: "Sheikh Rashid bin Saeed Al Maktoum",
        B: "Sheikh Zayed bin Sultan Al Nahyan",
        C: "Sheikh Khalifa bin Zayed Al Nahyan",
        D: "Sheikh Saud bin Rashid Al Mualla",
      },
      correctKey: "B",
      explanation: "Sheikh Zayed bin Sultan Al Nahyan of Abu Dhabi played the leading role in founding the UAE.",
    },
    {
      prompt: "How many emirates originally joined the federation on December 2, 1971?",
      options: { A: "Five", B: "Six", C: "Seven", D: "Four" },
      correctKey: "B",
      explanation:
        "Six emirates formed the federation on December 2, 1971 (Abu Dhabi, Dubai, Sharjah, Ajman, Umm al-Quwain, and Fujairah). " +
        "Ras Al Khaimah joined in early 1972, bringing the total to seven.",
    },
    {
      prompt:
        "Before the federation, what was the collective name used for the group of sheikhdoms on the southeastern Persian Gulf coast under British treaties?",
      options: { A: "Trucial States", B: "Gulf Sultanates", C: "Eastern Emirates", D: "Maritime Confederation" },
      correctKey: "A",
      explanation: "They were commonly known as the Trucial States due to a series of truces and treaty relationships with Britain.",
    },
    {
      prompt: "Which emirate is the capital of the UAE?",
      options: { A: "Dubai", B: "Sharjah", C: "Abu Dhabi", D: "Ajman" },
      correctKey: "C",
      explanation: "Abu Dhabi is the capital of the UAE and is the seat of the federal government.",
    },
    {
      prompt: "In which decade were commercial oil exports first discovered and developed in the area that became the UAE?",
      options: { A: "1910s", B: "1930s", C: "1950s", D: "1970s" },
      correctKey: "C",
      explanation: "Significant oil discoveries in the region occurred in the 1950s and 1960s, accelerating economic and social change.",
    },
    {
      prompt:
        "Which city is famous for rapid trade and later turned into a global business and tourism hub, notably under the leadership of Sheikh Rashid bin Saeed Al Maktoum?",
      options: { A: "Al Ain", B: "Dubai", C: "Fujairah", D: "Ras Al Khaimah" },
      correctKey: "B",
      explanation: "Dubai developed rapidly from a trading port into an international center for business and tourism.",
    },
    {
      prompt: "What is the official language of the United Arab Emirates?",
      options: { A: "English", B: "Persian", C: "Arabic", D: "Urdu" },
      correctKey: "C",
      explanation: "Arabic is the official language of the UAE.",
    },
    {
      prompt: "Which body is the UAE's highest constitutional authority, composed of the rulers of the emirates?",
      options: { A: "Federal National Council", B: "Council of Ministers", C: "Federal Supreme Council", D: "Consultative Assembly" },
      correctKey: "C",
      explanation: "The Federal Supreme Council, made up of the rulers of the emirates, is the highest constitutional authority.",
    },
    {
      prompt: "Which emirate joined the UAE after the initial formation in December 1971, completing the seven emirates?",
      options: { A: "Ras Al Khaimah", B: "Sharjah", C: "Fujairah", D: "Ajman" },
      correctKey: "A",
      explanation: "Ras Al Khaimah joined the federation in February 1972.",
    },
  ],
};
